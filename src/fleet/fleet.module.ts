import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpModule } from '@nestjs/axios';
import { DEFAULT_BACKEND_REQUEST_TIMEOUT, DEFAULT_SIMULATED_SETTLE_POLLS } from '../config/config.constants';
import type { FleetConfig } from '../config/config.types';
import { FleetHttpClient } from './http/fleet-http.client';
import { HttpComputeService } from './http/http-compute.service';
import { HttpLoadBalancerService } from './http/http-load-balancer.service';
import { SimulatedFleetService } from './simulated/simulated-fleet.service';
import type { ComputeService, LoadBalancerService } from './interfaces';
import { COMPUTE_SERVICE, FLEET_CONFIG, LOAD_BALANCER_SERVICE } from './fleet.tokens';

/**
 * Factory provider for FleetConfig.
 * Without a rollout config namespace the simulated fleet is used.
 */
const fleetConfigProvider = {
  provide: FLEET_CONFIG,
  useFactory: (configService: ConfigService): FleetConfig => {
    const config = configService.get<FleetConfig>('rollout.fleet');
    return (
      config ??
      ({
        driver: 'simulated',
        compute: { url: '' },
        loadBalancer: { url: '' },
        apiKey: '',
        timeout: DEFAULT_BACKEND_REQUEST_TIMEOUT,
        simulated: { settlePolls: DEFAULT_SIMULATED_SETTLE_POLLS },
      } satisfies FleetConfig)
    );
  },
  inject: [ConfigService],
};

const computeServiceProvider = {
  provide: COMPUTE_SERVICE,
  useFactory: (config: FleetConfig, http: HttpComputeService, simulated: SimulatedFleetService): ComputeService =>
    config.driver === 'http' ? http : simulated,
  inject: [FLEET_CONFIG, HttpComputeService, SimulatedFleetService],
};

const loadBalancerServiceProvider = {
  provide: LOAD_BALANCER_SERVICE,
  useFactory: (
    config: FleetConfig,
    http: HttpLoadBalancerService,
    simulated: SimulatedFleetService,
  ): LoadBalancerService => (config.driver === 'http' ? http : simulated),
  inject: [FLEET_CONFIG, HttpLoadBalancerService, SimulatedFleetService],
};

/**
 * Adapters for the compute orchestration and load balancer services,
 * selected by ROLLOUT_FLEET_DRIVER.
 */
@Module({
  imports: [HttpModule],
  providers: [
    fleetConfigProvider,
    FleetHttpClient,
    HttpComputeService,
    HttpLoadBalancerService,
    SimulatedFleetService,
    computeServiceProvider,
    loadBalancerServiceProvider,
  ],
  exports: [COMPUTE_SERVICE, LOAD_BALANCER_SERVICE, SimulatedFleetService],
})
export class FleetModule {}
