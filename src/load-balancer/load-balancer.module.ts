import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DEFAULT_LB_POLL_INTERVAL, DEFAULT_LB_WAIT_TIMEOUT } from '../config/config.constants';
import type { LoadBalancerWaitConfig } from '../config/config.types';
import { FleetModule } from '../fleet/fleet.module';
import { LoadBalancerManagerService } from './load-balancer-manager.service';
import { LOAD_BALANCER_WAIT_CONFIG } from './load-balancer.tokens';

const loadBalancerWaitConfigProvider = {
  provide: LOAD_BALANCER_WAIT_CONFIG,
  useFactory: (configService: ConfigService): LoadBalancerWaitConfig =>
    configService.get<LoadBalancerWaitConfig>('rollout.loadBalancer') ?? {
      waitTimeoutMs: DEFAULT_LB_WAIT_TIMEOUT * 1000,
      pollIntervalMs: DEFAULT_LB_POLL_INTERVAL,
    },
  inject: [ConfigService],
};

@Module({
  imports: [FleetModule],
  providers: [loadBalancerWaitConfigProvider, LoadBalancerManagerService],
  exports: [LoadBalancerManagerService],
})
export class LoadBalancerModule {}
