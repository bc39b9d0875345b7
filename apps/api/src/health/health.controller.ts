import { Controller, Get } from '@nestjs/common';
import { Public } from '../auth/public.decorator';
import { AccessGateService } from '../auth/access-gate.service';
import { MonitorService } from '../monitor/monitor.service';

export type LoopStatus = 'idle' | 'starting' | 'ok' | 'stale';

// Loop is considered stale after this many missed refresh intervals
const STALE_AFTER_INTERVALS = 10;

@Controller('health')
export class HealthController {
  constructor(
    private readonly monitorService: MonitorService,
    private readonly gate: AccessGateService,
  ) {}

  // Public endpoint for uptime monitors (no auth required)
  @Public()
  @Get()
  getQuickHealth(): { status: LoopStatus; lastRefreshAt: string | null; cycles: number } {
    const state = this.monitorService.snapshot();
    const lastRefreshAt = state.lastRefreshAt?.toISOString() ?? null;

    let status: LoopStatus;
    if (!this.gate.isGranted()) {
      status = 'idle';
    } else if (!state.lastRefreshAt) {
      status = 'starting';
    } else {
      const age = Date.now() - state.lastRefreshAt.getTime();
      status = age > this.monitorService.settings.refreshIntervalMs * STALE_AFTER_INTERVALS ? 'stale' : 'ok';
    }

    return { status, lastRefreshAt, cycles: state.cycleCount };
  }
}
