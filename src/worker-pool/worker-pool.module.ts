import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Worker } from 'worker_threads';
import * as path from 'path';
import { AppConfig } from '../config/configuration';
import { WORKER_POOL_PORT } from '../infrastructure/infrastructure.module';
import { PoolManagerService } from './pool-manager.service';
import { WORKER_FACTORY, WorkerFactory } from './interfaces/worker-handle.interface';
import { WorkerBootstrapData } from './interfaces/worker-message.interface';

@Module({
  providers: [
    {
      provide: WORKER_FACTORY,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig>): WorkerFactory => {
        const workerPath = path.join(__dirname, 'threads', 'worker-thread.js');
        const logLevel = configService.getOrThrow('logLevel', { infer: true });
        const nodeEnv = configService.getOrThrow('nodeEnv', { infer: true });

        return (workerId) => {
          const workerData: WorkerBootstrapData = { workerId, logLevel, nodeEnv };
          return new Worker(workerPath, { workerData });
        };
      },
    },
    PoolManagerService,
    {
      provide: WORKER_POOL_PORT,
      useExisting: PoolManagerService,
    },
  ],
  exports: [PoolManagerService, WORKER_POOL_PORT],
})
export class WorkerPoolModule {}
