import { Module } from '@nestjs/common';
import { DeploymentModule } from '../deployment/deployment.module';
import { FleetModule } from '../fleet/fleet.module';
import { LoadBalancerModule } from '../load-balancer/load-balancer.module';
import { LockModule } from '../lock/lock.module';
import { RollingDeployService } from './rolling-deploy.service';

@Module({
  imports: [LockModule, FleetModule, LoadBalancerModule, DeploymentModule],
  providers: [RollingDeployService],
  exports: [RollingDeployService],
})
export class RolloutModule {}
