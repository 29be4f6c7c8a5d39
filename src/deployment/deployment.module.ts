import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DEFAULT_DEPLOY_POLL_INTERVAL, DEFAULT_DEPLOY_TIMEOUT } from '../config/config.constants';
import type { DeployConfig } from '../config/config.types';
import { FleetModule } from '../fleet/fleet.module';
import { DeploymentDriverService } from './deployment-driver.service';
import { DEPLOY_CONFIG } from './deployment.tokens';

const deployConfigProvider = {
  provide: DEPLOY_CONFIG,
  useFactory: (configService: ConfigService): DeployConfig =>
    configService.get<DeployConfig>('rollout.deploy') ?? {
      timeoutMs: DEFAULT_DEPLOY_TIMEOUT * 1000,
      pollIntervalMs: DEFAULT_DEPLOY_POLL_INTERVAL,
    },
  inject: [ConfigService],
};

@Module({
  imports: [FleetModule],
  providers: [deployConfigProvider, DeploymentDriverService],
  exports: [DeploymentDriverService],
})
export class DeploymentModule {}
