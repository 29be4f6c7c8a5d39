import type { LoadBalancer, LoadBalancerInstanceState, RegistrationResult } from './load-balancer.interface';

/**
 * Port to the load balancer service. Every call reflects remote state that
 * converges eventually; callers confirm transitions with {@link pollInstanceState}.
 */
export interface LoadBalancerService {
  listLoadBalancers(): Promise<LoadBalancer[]>;

  /**
   * @returns Target ids still attached after the request was accepted
   */
  deregister(loadBalancerName: string, targetIds: string[]): Promise<string[]>;

  register(loadBalancerName: string, targetIds: string[]): Promise<RegistrationResult>;

  pollInstanceState(loadBalancerName: string, targetId: string): Promise<LoadBalancerInstanceState>;
}
