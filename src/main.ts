import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { RollingDeployService } from './rollout/rolling-deploy.service';
import { logConfigurationSummary } from './config/config.utils';
import type { RolloutConfiguration } from './config/config.types';

/**
 * BootStrap
 *
 * Runs one rolling deploy for the configured target and exits. The exit
 * code is 0 when every batch deployed and was reattached, 1 otherwise.
 */
async function bootstrap() {
  const logger = new Logger('bootstrap');

  const isDevelopment = process.env.NODE_ENV === 'development';
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: isDevelopment ? ['log', 'error', 'warn', 'debug', 'verbose'] : ['log', 'error', 'warn'],
  });
  app.enableShutdownHooks();

  try {
    const config = app.get<ConfigService>(ConfigService);
    const rolloutConfig = config.get<RolloutConfiguration>('rollout');
    if (!rolloutConfig) {
      throw new Error('Rollout configuration is not loaded');
    }

    if (rolloutConfig.environment === 'development') {
      logger.log(`RUNNING IN DEVELOPMENT MODE`);
      logConfigurationSummary(rolloutConfig);
    }

    const { stackId, layerId, appId, percent } = rolloutConfig.target;
    logger.log(
      `Starting rolling deploy of ${appId || '(unset)'} to layer ${layerId || '(unset)'} ` +
        `(${percent === undefined ? 'all at once' : `${percent * 100}% per batch`})`,
    );

    const rollingDeployService = app.get(RollingDeployService);
    const summary = await rollingDeployService.rollingDeploy({ stackId, layerId, appId, percent });

    logger.log(`Rolling deploy finished: ${summary.batches.length} batch(es), ${summary.eligibleInstances} instance(s)`);
    process.exitCode = 0;
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    const errorStack = error instanceof Error ? error.stack : undefined;
    logger.error(`Rolling deploy failed: ${errorMessage}`, errorStack);
    process.exitCode = 1;
  } finally {
    await app.close();
  }
}
bootstrap().catch((error) => {
  const logger = new Logger('bootstrap');
  const errorMessage = error instanceof Error ? error.message : String(error);
  logger.error(`Unhandled bootstrap error: ${errorMessage}`);
  process.exit(1);
});
