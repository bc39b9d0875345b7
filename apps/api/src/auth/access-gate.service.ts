import { Injectable, Logger } from '@nestjs/common';

/**
 * Process-wide access decision. The refresh loop stays idle until the
 * shared password has been presented once.
 */
@Injectable()
export class AccessGateService {
  private readonly logger = new Logger(AccessGateService.name);
  private grantedAt: Date | null = null;

  grant(now: Date = new Date()): void {
    if (this.grantedAt) return;
    this.grantedAt = now;
    this.logger.log('Access granted, monitor loop enabled');
  }

  isGranted(): boolean {
    return this.grantedAt !== null;
  }

  get grantedSince(): Date | null {
    return this.grantedAt;
  }
}
