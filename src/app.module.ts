import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import appConfig from './app.config';
import { LockModule } from './lock/lock.module';
import { FleetModule } from './fleet/fleet.module';
import { LoadBalancerModule } from './load-balancer/load-balancer.module';
import { DeploymentModule } from './deployment/deployment.module';
import { RolloutModule } from './rollout/rollout.module';
import { ProgressModule } from './progress/progress.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig],
    }),
    EventEmitterModule.forRoot(),
    LockModule,
    FleetModule,
    LoadBalancerModule,
    DeploymentModule,
    RolloutModule,
    ProgressModule,
  ],
})
export class AppModule {}
