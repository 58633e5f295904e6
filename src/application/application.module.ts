import { Module } from '@nestjs/common';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { WorkerPoolModule } from '../worker-pool/worker-pool.module';
import { RunInvocationUseCase } from './use-cases/run-invocation.use-case';

/**
 * Application Module
 * Contains the use cases
 *
 * Use cases depend on output ports (interfaces); InfrastructureModule and
 * WorkerPoolModule bind them to implementations.
 */
@Module({
  imports: [InfrastructureModule, WorkerPoolModule],
  providers: [RunInvocationUseCase],
  exports: [RunInvocationUseCase],
})
export class ApplicationModule {}
