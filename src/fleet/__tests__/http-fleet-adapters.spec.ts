import { HttpComputeService } from '../http/http-compute.service';
import { HttpLoadBalancerService } from '../http/http-load-balancer.service';
import { FleetHttpClient } from '../http/fleet-http.client';
import { FleetRequestError } from '../fleet.errors';
import type { FleetConfig } from '../../config/config.types';

describe('HTTP fleet adapters', () => {
  const config: FleetConfig = {
    driver: 'http',
    compute: { url: 'https://compute.internal/' },
    loadBalancer: { url: 'https://elb.internal' },
    apiKey: '',
    timeout: 1000,
    simulated: { settlePolls: 1 },
  };

  let client: jest.Mocked<Pick<FleetHttpClient, 'get' | 'post'>>;

  beforeEach(() => {
    client = { get: jest.fn(), post: jest.fn() };
  });

  describe('HttpComputeService', () => {
    const createService = () => new HttpComputeService(config, client as unknown as FleetHttpClient);

    it('should list the instances of a layer', async () => {
      const instances = [{ instanceId: 'inst-a', targetId: 'i-0a', hostname: 'web-a', status: 'online' }];
      client.get.mockResolvedValue(instances);

      await expect(createService().listInstances('layer web')).resolves.toEqual(instances);
      expect(client.get).toHaveBeenCalledWith('https://compute.internal/layers/layer%20web/instances');
    });

    it('should reject a malformed instance list', async () => {
      client.get.mockResolvedValue([{ instanceId: 'inst-a' }]);

      await expect(createService().listInstances('layer-web')).rejects.toThrow(FleetRequestError);
    });

    it('should create a deployment with the full request', async () => {
      client.post.mockResolvedValue({ deploymentId: 'd-1' });
      const request = {
        stackId: 'stack-1',
        appId: 'app-1',
        instanceIds: ['inst-a'],
        command: { name: 'deploy' as const, args: { migrate: ['true'] } },
      };

      await expect(createService().createDeployment(request)).resolves.toEqual({ deploymentId: 'd-1' });
      expect(client.post).toHaveBeenCalledWith('https://compute.internal/deployments', request);
    });

    it('should read the deployment status', async () => {
      client.get.mockResolvedValue({ deploymentId: 'd-1', status: 'successful' });

      await expect(createService().pollDeployment({ deploymentId: 'd-1' })).resolves.toBe('successful');
      expect(client.get).toHaveBeenCalledWith('https://compute.internal/deployments/d-1');
    });

    it('should reject an unknown deployment status', async () => {
      client.get.mockResolvedValue({ deploymentId: 'd-1', status: 'pending' });

      await expect(createService().pollDeployment({ deploymentId: 'd-1' })).rejects.toThrow(
        'GET https://compute.internal/deployments/d-1 returned an unknown deployment status',
      );
    });
  });

  describe('HttpLoadBalancerService', () => {
    const createService = () => new HttpLoadBalancerService(config, client as unknown as FleetHttpClient);

    it('should list load balancers', async () => {
      client.get.mockResolvedValue([{ name: 'web-lb', instanceIds: ['i-0a', 'i-0b'] }]);

      await expect(createService().listLoadBalancers()).resolves.toEqual([
        { name: 'web-lb', instanceIds: ['i-0a', 'i-0b'] },
      ]);
      expect(client.get).toHaveBeenCalledWith('https://elb.internal/load-balancers');
    });

    it('should deregister and return the remaining targets', async () => {
      client.post.mockResolvedValue({ instanceIds: ['i-0b'] });

      await expect(createService().deregister('web-lb', ['i-0a'])).resolves.toEqual(['i-0b']);
      expect(client.post).toHaveBeenCalledWith('https://elb.internal/load-balancers/web-lb/deregister', {
        instanceIds: ['i-0a'],
      });
    });

    it('should register and return the registration result', async () => {
      client.post.mockResolvedValue({ instanceIds: ['i-0b', 'i-0a'] });

      await expect(createService().register('web-lb', ['i-0a'])).resolves.toEqual({
        loadBalancerName: 'web-lb',
        instanceIds: ['i-0b', 'i-0a'],
      });
      expect(client.post).toHaveBeenCalledWith('https://elb.internal/load-balancers/web-lb/register', {
        instanceIds: ['i-0a'],
      });
    });

    it('should read an instance state', async () => {
      client.get.mockResolvedValue({ state: 'out-of-service' });

      await expect(createService().pollInstanceState('web-lb', 'i-0a')).resolves.toBe('out-of-service');
      expect(client.get).toHaveBeenCalledWith('https://elb.internal/load-balancers/web-lb/instances/i-0a');
    });

    it('should reject a membership response without instance ids', async () => {
      client.post.mockResolvedValue({ ok: true });

      await expect(createService().deregister('web-lb', ['i-0a'])).rejects.toThrow(
        'POST https://elb.internal/load-balancers/web-lb/deregister did not return the attached instances',
      );
    });
  });
});
