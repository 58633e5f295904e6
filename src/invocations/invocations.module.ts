import { Module } from '@nestjs/common';
import { ApplicationModule } from '../application/application.module';
import { InvocationsController } from './invocations.controller';

@Module({
  imports: [ApplicationModule],
  controllers: [InvocationsController],
})
export class InvocationsModule {}
