import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../config/configuration';

// Injection tokens (string symbols for DI)
export const EVENT_PUBLISHER_PORT = 'EventPublisherPort';
export const EXTERNAL_TOOL_RUNNER_PORT = 'ExternalToolRunnerPort';
export const WORKER_POOL_PORT = 'WorkerPoolPort';

// Adapters (implementations)
import { ConsoleEventPublisherAdapter } from './adapters/events/console-event-publisher.adapter';
import { ProcessToolRunner } from './adapters/tools/process-tool-runner.adapter';

/**
 * Infrastructure Module
 * Provides implementations (adapters) for the output ports
 *
 * The worker pool port is provided by WorkerPoolModule. The tool runner bound
 * here serves the main thread (version probes, readiness); each worker
 * thread builds its own runner.
 */
@Module({
  providers: [
    // Event publisher adapter
    ConsoleEventPublisherAdapter,
    {
      provide: EVENT_PUBLISHER_PORT,
      useClass: ConsoleEventPublisherAdapter,
    },

    // External tools adapter
    {
      provide: EXTERNAL_TOOL_RUNNER_PORT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig>) =>
        new ProcessToolRunner(configService.getOrThrow('tools', { infer: true })),
    },
  ],
  exports: [EVENT_PUBLISHER_PORT, EXTERNAL_TOOL_RUNNER_PORT],
})
export class InfrastructureModule {}
