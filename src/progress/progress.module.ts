import { Module } from '@nestjs/common';
import { ProgressLoggerService } from './progress-logger.service';

/**
 * Logs rollout progress events. Requires EventEmitterModule.forRoot() in the root module.
 */
@Module({
  providers: [ProgressLoggerService],
})
export class ProgressModule {}
