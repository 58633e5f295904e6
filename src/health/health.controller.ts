import { Controller, Get } from '@nestjs/common';
import { HealthCheck, HealthCheckService, MemoryHealthIndicator } from '@nestjs/terminus';
import { WorkerPoolHealthIndicator } from './indicators/worker-pool.health';
import { DiskSpaceHealthIndicator } from './indicators/disk-space.health';
import { ToolsHealthIndicator } from './indicators/tools.health';

const HEAP_LIMIT_BYTES = 500 * 1024 * 1024; // 500MB
const RSS_LIMIT_BYTES = 1024 * 1024 * 1024; // 1GB

@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly memory: MemoryHealthIndicator,
    private readonly workerPoolHealth: WorkerPoolHealthIndicator,
    private readonly toolsHealth: ToolsHealthIndicator,
    private readonly diskSpaceHealth: DiskSpaceHealthIndicator,
  ) {}

  @Get()
  @HealthCheck()
  check() {
    return this.health.check([
      () => this.memory.checkHeap('memory_heap', HEAP_LIMIT_BYTES),
      () => this.workerPoolHealth.isHealthy('worker_pool'),
    ]);
  }

  @Get('live')
  @HealthCheck()
  liveness() {
    return this.health.check([() => this.memory.checkHeap('memory_heap', HEAP_LIMIT_BYTES)]);
  }

  @Get('ready')
  @HealthCheck()
  readiness() {
    return this.health.check([
      () => this.workerPoolHealth.isHealthy('worker_pool'),
      () => this.toolsHealth.isHealthy('tools'),
      () => this.diskSpaceHealth.isHealthy('disk_space'),
    ]);
  }

  @Get('detailed')
  @HealthCheck()
  detailed() {
    return this.health.check([
      () => this.memory.checkHeap('memory_heap', HEAP_LIMIT_BYTES),
      () => this.memory.checkRSS('memory_rss', RSS_LIMIT_BYTES),
      () => this.workerPoolHealth.isHealthy('worker_pool', true),
      () => this.toolsHealth.isHealthy('tools'),
      () => this.diskSpaceHealth.isHealthy('disk_space'),
    ]);
  }
}
