import { Test, TestingModule } from '@nestjs/testing';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { RollingDeployService } from '../rolling-deploy.service';
import { DistributedLockService } from '../../lock/distributed-lock.service';
import { LoadBalancerManagerService } from '../../load-balancer/load-balancer-manager.service';
import { DeploymentDriverService } from '../../deployment/deployment-driver.service';
import { DeployFailedError, DeployTimeoutError } from '../../deployment/deployment.errors';
import { LoadBalancerWaitTimeoutError } from '../../load-balancer/load-balancer.errors';
import { LockTimeoutError } from '../../lock/lock.errors';
import { COMPUTE_SERVICE } from '../../fleet/fleet.tokens';
import { LOCK_CONFIG } from '../../lock/lock.tokens';
import { InvalidArgumentError } from '../../shared/errors';
import type { ComputeService, Instance, LoadBalancer } from '../../fleet/interfaces';
import { silenceNestLogger } from '../../../test/helpers/silence-logger';

describe('RollingDeployService', () => {
  let service: RollingDeployService;
  let lockService: { withLock: jest.Mock };
  let loadBalancerManager: { detach: jest.Mock; attach: jest.Mock };
  let deploymentDriver: { deploy: jest.Mock };
  let computeService: jest.Mocked<ComputeService>;
  let eventEmitter: { emit: jest.Mock };
  let calls: string[];
  let restoreLogger: () => void;

  const createInstance = (suffix: string, status = 'online'): Instance => ({
    instanceId: `inst-${suffix}`,
    targetId: `i-0${suffix}`,
    hostname: `web-${suffix}`,
    status,
  });

  const [a, b, c, d] = ['a', 'b', 'c', 'd'].map((suffix) => createInstance(suffix));
  const webLb: LoadBalancer = { name: 'web-lb', instanceIds: ['i-0a', 'i-0b', 'i-0c', 'i-0d'] };

  const request = { stackId: 'stack-1', layerId: 'layer-web', appId: 'app-1' };

  const hostnamesOf = (instances: Instance[]) => instances.map((instance) => instance.hostname).join(',');

  beforeEach(async () => {
    restoreLogger = silenceNestLogger();
    calls = [];

    lockService = {
      withLock: jest.fn(async (name: string, _maxWaitMs: number, body: () => Promise<unknown>) => {
        calls.push(`lock:${name}`);
        try {
          return await body();
        } finally {
          calls.push(`unlock:${name}`);
        }
      }),
    };
    loadBalancerManager = {
      detach: jest.fn(async (batch: Instance[]) => {
        calls.push(`detach:${hostnamesOf(batch)}`);
        return [webLb];
      }),
      attach: jest.fn(async (batch: Instance[]) => {
        calls.push(`attach:${hostnamesOf(batch)}`);
        return { 'web-lb': { loadBalancerName: 'web-lb', instanceIds: webLb.instanceIds } };
      }),
    };
    let deployments = 0;
    deploymentDriver = {
      deploy: jest.fn(async (_stackId: string, _appId: string, instanceIds: string[]) => {
        deployments += 1;
        calls.push(`deploy:${instanceIds.join(',')}`);
        return { deploymentId: `d-${deployments}`, status: 'successful' };
      }),
    };
    computeService = {
      listInstances: jest.fn().mockResolvedValue([a, b, c, d]),
      createDeployment: jest.fn(),
      pollDeployment: jest.fn(),
    };
    eventEmitter = { emit: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RollingDeployService,
        { provide: DistributedLockService, useValue: lockService },
        { provide: LoadBalancerManagerService, useValue: loadBalancerManager },
        { provide: DeploymentDriverService, useValue: deploymentDriver },
        { provide: COMPUTE_SERVICE, useValue: computeService },
        { provide: LOCK_CONFIG, useValue: { name: 'deploy', maxWaitMs: 600000 } },
        { provide: EventEmitter2, useValue: eventEmitter },
      ],
    }).compile();

    service = module.get<RollingDeployService>(RollingDeployService);
  });

  afterEach(() => {
    restoreLogger();
  });

  describe('batching', () => {
    it('should deploy every online instance in one batch without a percent', async () => {
      const summary = await service.rollingDeploy(request);

      expect(calls).toEqual([
        'lock:deploy',
        'detach:web-a,web-b,web-c,web-d',
        'deploy:inst-a,inst-b,inst-c,inst-d',
        'attach:web-a,web-b,web-c,web-d',
        'unlock:deploy',
      ]);
      expect(summary).toEqual({
        stackId: 'stack-1',
        layerId: 'layer-web',
        appId: 'app-1',
        eligibleInstances: 4,
        batches: [
          { index: 1, hostnames: ['web-a', 'web-b', 'web-c', 'web-d'], loadBalancers: ['web-lb'], deploymentId: 'd-1' },
        ],
      });
    });

    it('should run batches sequentially with a percent', async () => {
      const summary = await service.rollingDeploy({ ...request, percent: 0.5 });

      expect(calls).toEqual([
        'lock:deploy',
        'detach:web-a,web-b',
        'deploy:inst-a,inst-b',
        'attach:web-a,web-b',
        'detach:web-c,web-d',
        'deploy:inst-c,inst-d',
        'attach:web-c,web-d',
        'unlock:deploy',
      ]);
      expect(summary.batches.map((batch) => batch.deploymentId)).toEqual(['d-1', 'd-2']);
    });

    it('should skip instances that are not online', async () => {
      computeService.listInstances.mockResolvedValue([a, createInstance('x', 'stopped'), b]);

      const summary = await service.rollingDeploy(request);

      expect(deploymentDriver.deploy).toHaveBeenCalledWith('stack-1', 'app-1', ['inst-a', 'inst-b']);
      expect(summary.eligibleInstances).toBe(2);
    });

    it('should succeed without batches when no instance is online', async () => {
      computeService.listInstances.mockResolvedValue([createInstance('x', 'stopped')]);

      const summary = await service.rollingDeploy(request);

      expect(summary.batches).toEqual([]);
      expect(loadBalancerManager.detach).not.toHaveBeenCalled();
      expect(calls).toEqual(['lock:deploy', 'unlock:deploy']);
      expect(eventEmitter.emit).toHaveBeenCalledWith('rollout.completed', { summary });
    });

    it('should pass the snapshot from detach to attach', async () => {
      await service.rollingDeploy(request);

      expect(loadBalancerManager.attach).toHaveBeenCalledWith([a, b, c, d], [webLb]);
    });

    it('should emit batch events around each batch', async () => {
      await service.rollingDeploy({ ...request, percent: 0.5 });

      const events = eventEmitter.emit.mock.calls.map(([event]) => event);
      expect(events).toEqual(['batch.started', 'batch.done', 'batch.started', 'batch.done', 'rollout.completed']);
      expect(eventEmitter.emit).toHaveBeenCalledWith('batch.started', {
        index: 2,
        total: 2,
        hostnames: ['web-c', 'web-d'],
      });
    });
  });

  describe('failures', () => {
    it('should reattach and stop the rollout when a deploy fails', async () => {
      deploymentDriver.deploy.mockImplementationOnce(async () => {
        calls.push('deploy:failed');
        throw new DeployFailedError('d-1');
      });

      await expect(service.rollingDeploy({ ...request, percent: 0.5 })).rejects.toBeInstanceOf(DeployFailedError);

      expect(calls).toEqual([
        'lock:deploy',
        'detach:web-a,web-b',
        'deploy:failed',
        'attach:web-a,web-b',
        'unlock:deploy',
      ]);
      expect(loadBalancerManager.attach).toHaveBeenCalledTimes(1);
    });

    it('should surface the deploy error when reattaching fails too', async () => {
      deploymentDriver.deploy.mockRejectedValueOnce(new DeployTimeoutError('d-1', 1800000));
      loadBalancerManager.attach.mockRejectedValueOnce(
        new LoadBalancerWaitTimeoutError('web-lb', 'registration', 600000, ['i-0a']),
      );

      await expect(service.rollingDeploy(request)).rejects.toBeInstanceOf(DeployTimeoutError);
      expect(calls[calls.length - 1]).toBe('unlock:deploy');
    });

    it('should propagate a reattach failure after a successful deploy', async () => {
      loadBalancerManager.attach.mockRejectedValueOnce(
        new LoadBalancerWaitTimeoutError('web-lb', 'registration', 600000, ['i-0a']),
      );

      await expect(service.rollingDeploy({ ...request, percent: 0.5 })).rejects.toBeInstanceOf(
        LoadBalancerWaitTimeoutError,
      );
      expect(deploymentDriver.deploy).toHaveBeenCalledTimes(1);
    });

    it('should not deploy or reattach when detach fails', async () => {
      loadBalancerManager.detach.mockRejectedValueOnce(
        new LoadBalancerWaitTimeoutError('web-lb', 'deregistration', 600000, ['i-0a']),
      );

      await expect(service.rollingDeploy(request)).rejects.toBeInstanceOf(LoadBalancerWaitTimeoutError);
      expect(deploymentDriver.deploy).not.toHaveBeenCalled();
      expect(loadBalancerManager.attach).not.toHaveBeenCalled();
    });

    it('should touch nothing when the lock times out', async () => {
      lockService.withLock.mockRejectedValueOnce(new LockTimeoutError('deploy', 600000));

      await expect(service.rollingDeploy(request)).rejects.toBeInstanceOf(LockTimeoutError);
      expect(computeService.listInstances).not.toHaveBeenCalled();
    });
  });

  describe('validation', () => {
    it('should use the configured lock name and wait', async () => {
      await service.rollingDeploy(request);

      expect(lockService.withLock).toHaveBeenCalledWith('deploy', 600000, expect.any(Function));
    });

    it('should reject a missing identifier before taking the lock', async () => {
      await expect(service.rollingDeploy({ ...request, appId: '' })).rejects.toThrow(
        'Invalid rolling deploy request: appId is required',
      );
      expect(lockService.withLock).not.toHaveBeenCalled();
    });

    it('should reject a percent outside (0, 1]', async () => {
      await expect(service.rollingDeploy({ ...request, percent: 1.5 })).rejects.toBeInstanceOf(InvalidArgumentError);
      await expect(service.rollingDeploy({ ...request, percent: 0 })).rejects.toBeInstanceOf(InvalidArgumentError);
      expect(lockService.withLock).not.toHaveBeenCalled();
    });
  });
});
