import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { HealthController } from './health.controller';
import { WorkerPoolHealthIndicator } from './indicators/worker-pool.health';
import { DiskSpaceHealthIndicator } from './indicators/disk-space.health';
import { ToolsHealthIndicator } from './indicators/tools.health';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { WorkerPoolModule } from '../worker-pool/worker-pool.module';

@Module({
  imports: [TerminusModule, InfrastructureModule, WorkerPoolModule],
  controllers: [HealthController],
  providers: [WorkerPoolHealthIndicator, ToolsHealthIndicator, DiskSpaceHealthIndicator],
})
export class HealthModule {}
