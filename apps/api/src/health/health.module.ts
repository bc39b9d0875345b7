import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { MonitorModule } from '../monitor/monitor.module';
import { HealthController } from './health.controller';

@Module({
  imports: [AuthModule, MonitorModule],
  controllers: [HealthController],
})
export class HealthModule {}
