import { Body, Controller, Get, Header, MessageEvent, Put, Res, Sse } from '@nestjs/common';
import { Response } from 'express';
import { Observable, map } from 'rxjs';
import { DisplayStore } from '../display/display-store.service';
import { renderPage, renderView } from '../presentation/html-renderer';
import { MonitorView } from '../presentation/view-model.types';
import { ChangeTickerDto } from './dto/change-ticker.dto';
import { MonitorService } from './monitor.service';

@Controller('monitor')
export class MonitorController {
  constructor(
    private readonly monitorService: MonitorService,
    private readonly displayStore: DisplayStore,
  ) {}

  @Get('view')
  getView(@Res({ passthrough: true }) res: Response): MonitorView | undefined {
    const view = this.displayStore.latest();
    if (!view) {
      res.status(204);
      return undefined;
    }
    return view;
  }

  @Get('state')
  getState() {
    return {
      state: this.monitorService.snapshot(),
      settings: this.monitorService.settingsCaption(),
    };
  }

  @Get('settings')
  getSettings() {
    return { lines: this.monitorService.settingsCaption() };
  }

  @Put('ticker')
  changeTicker(@Body() dto: ChangeTickerDto) {
    return this.monitorService.changeTicker(dto.symbol);
  }

  @Sse('stream')
  stream(): Observable<MessageEvent> {
    return this.displayStore.stream().pipe(
      map((view) => ({ type: 'view', data: { ...view, html: renderView(view) } })),
    );
  }

  @Get('display')
  @Header('Content-Type', 'text/html; charset=utf-8')
  @Header('Cache-Control', 'no-store')
  getDisplay(): string {
    const refreshSeconds = Math.max(1, Math.round(this.monitorService.settings.refreshIntervalMs / 1000));
    return renderPage(this.displayStore.latest(), refreshSeconds);
  }
}
