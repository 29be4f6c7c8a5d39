export interface LoadBalancer {
  name: string;
  /** Target ids currently attached */
  instanceIds: string[];
}

export const LOAD_BALANCER_INSTANCE_STATES = ['in-service', 'out-of-service', 'not-registered'] as const;

export type LoadBalancerInstanceState = (typeof LOAD_BALANCER_INSTANCE_STATES)[number];

export interface RegistrationResult {
  loadBalancerName: string;
  /** Target ids attached after the registration */
  instanceIds: string[];
}
