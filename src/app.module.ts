import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { LoggingModule } from './shared/logging/logging.module';
import { CorrelationIdMiddleware } from './shared/logging/correlation-id.middleware';
import { InvocationsModule } from './invocations/invocations.module';
import { HealthModule } from './health/health.module';

/**
 * Application Module
 * HTTP service running yt-dlp and ffmpeg on a fixed worker pool
 */
@Module({
  imports: [ConfigModule, LoggingModule, InvocationsModule, HealthModule],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(CorrelationIdMiddleware).forRoutes('*');
  }
}
