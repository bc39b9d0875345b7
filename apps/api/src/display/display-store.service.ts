import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { Observable, ReplaySubject } from 'rxjs';
import { MonitorView } from '../presentation/view-model.types';
import { MONITOR_VIEW_PUBLISHED } from './display.types';

@Injectable()
export class DisplayStore {
  private readonly logger = new Logger(DisplayStore.name);
  private current: MonitorView | null = null;
  private readonly views = new ReplaySubject<MonitorView>(1);

  @OnEvent(MONITOR_VIEW_PUBLISHED)
  handleViewPublished(view: MonitorView): void {
    this.current = view;
    this.views.next(view);
    this.logger.verbose(`${view.ticker} #${view.cycle} ${view.status}`);
  }

  latest(): MonitorView | null {
    return this.current;
  }

  // Replays the latest view to new subscribers
  stream(): Observable<MonitorView> {
    return this.views.asObservable();
  }
}
