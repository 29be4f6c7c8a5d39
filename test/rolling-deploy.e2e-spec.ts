import { join } from 'path';
import { Test, TestingModule } from '@nestjs/testing';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { AppModule } from '../src/app.module';
import { RollingDeployService } from '../src/rollout/rolling-deploy.service';
import { SimulatedFleetService } from '../src/fleet/simulated/simulated-fleet.service';
import { DeployFailedError } from '../src/deployment/deployment.errors';
import { ROLLOUT_EVENTS } from '../src/progress/progress-events';
import type { BatchEvent } from '../src/progress/progress-events';
import { silenceNestLogger } from './helpers/silence-logger';

const FIXTURE_PATH = join(__dirname, '..', 'fixtures', 'simulated-fleet.json');

describe('Rolling deploy (e2e)', () => {
  let app: TestingModule;
  let rollingDeployService: RollingDeployService;
  let fleet: SimulatedFleetService;
  let eventEmitter: EventEmitter2;
  let restoreLogger: () => void;
  const originalEnv = { ...process.env };

  const webRequest = { stackId: 'stack-1', layerId: 'layer-web', appId: 'app-1' };
  const workerRequest = { stackId: 'stack-1', layerId: 'layer-worker', appId: 'app-1' };

  const membershipOf = async (name: string): Promise<string[]> => {
    const loadBalancers = await fleet.listLoadBalancers();
    return loadBalancers.find((loadBalancer) => loadBalancer.name === name)?.instanceIds ?? [];
  };

  beforeEach(async () => {
    restoreLogger = silenceNestLogger();
    process.env = {
      ...originalEnv,
      NODE_ENV: 'test',
      ROLLOUT_FLEET_DRIVER: 'simulated',
      ROLLOUT_SIMULATED_FLEET_PATH: FIXTURE_PATH,
      ROLLOUT_SIMULATED_SETTLE_POLLS: '1',
      ROLLOUT_LOCK_BACKEND: 'memory',
      ROLLOUT_LOCK_NAME: 'deploy',
      ROLLOUT_LOCK_MAX_WAIT: '5',
      ROLLOUT_LOCK_POLL_INTERVAL: '10',
      ROLLOUT_DEPLOY_POLL_INTERVAL: '5',
      ROLLOUT_LB_POLL_INTERVAL: '5',
    };

    app = await Test.createTestingModule({
      imports: [AppModule],
    }).compile();
    await app.init();

    rollingDeployService = app.get(RollingDeployService);
    fleet = app.get(SimulatedFleetService);
    eventEmitter = app.get(EventEmitter2);
  });

  afterEach(async () => {
    await app.close();
    process.env = { ...originalEnv };
    restoreLogger();
  });

  it('should deploy the online web instances in two batches and restore web-lb', async () => {
    const summary = await rollingDeployService.rollingDeploy({ ...webRequest, percent: 0.5 });

    expect(summary).toEqual({
      stackId: 'stack-1',
      layerId: 'layer-web',
      appId: 'app-1',
      eligibleInstances: 4,
      batches: [
        { index: 1, hostnames: ['web-a', 'web-b'], loadBalancers: ['web-lb'], deploymentId: 'deployment-1' },
        { index: 2, hostnames: ['web-c', 'web-d'], loadBalancers: ['web-lb'], deploymentId: 'deployment-2' },
      ],
    });
    expect(await membershipOf('web-lb')).toEqual(['i-0a', 'i-0b', 'i-0c', 'i-0d']);
    expect(fleet.listDeployments()).toEqual([
      {
        stackId: 'stack-1',
        appId: 'app-1',
        instanceIds: ['inst-a', 'inst-b'],
        command: { name: 'deploy', args: { migrate: ['true'] } },
      },
      {
        stackId: 'stack-1',
        appId: 'app-1',
        instanceIds: ['inst-c', 'inst-d'],
        command: { name: 'deploy', args: { migrate: ['true'] } },
      },
    ]);
  });

  it('should reattach a batch whose deployment failed and stop the rollout', async () => {
    fleet.queueDeploymentOutcome('failed');

    await expect(rollingDeployService.rollingDeploy({ ...webRequest, percent: 0.5 })).rejects.toBeInstanceOf(
      DeployFailedError,
    );

    expect([...(await membershipOf('web-lb'))].sort()).toEqual(['i-0a', 'i-0b', 'i-0c', 'i-0d']);
    expect(fleet.listDeployments()).toHaveLength(1);
  });

  it('should skip a load balancer the batch would empty and still deploy', async () => {
    const summary = await rollingDeployService.rollingDeploy(workerRequest);

    expect(summary.batches).toEqual([
      { index: 1, hostnames: ['worker-1'], loadBalancers: [], deploymentId: 'deployment-1' },
    ]);
    expect(await membershipOf('worker-lb')).toEqual(['i-1a']);
  });

  it('should serialize concurrent rollouts behind the deploy lock', async () => {
    const timeline: string[] = [];
    eventEmitter.on(ROLLOUT_EVENTS.BATCH_STARTED, (event: BatchEvent) => {
      timeline.push(`started:${event.hostnames.join(',')}`);
    });
    eventEmitter.on(ROLLOUT_EVENTS.BATCH_DONE, (event: BatchEvent) => {
      timeline.push(`done:${event.hostnames.join(',')}`);
    });

    const [web, worker] = await Promise.all([
      rollingDeployService.rollingDeploy(webRequest),
      rollingDeployService.rollingDeploy(workerRequest),
    ]);

    expect(web.batches).toHaveLength(1);
    expect(worker.batches).toHaveLength(1);
    expect(timeline).toHaveLength(4);
    expect(timeline[0].replace('started:', 'done:')).toBe(timeline[1]);
    expect(timeline[2].replace('started:', 'done:')).toBe(timeline[3]);
  });
});
