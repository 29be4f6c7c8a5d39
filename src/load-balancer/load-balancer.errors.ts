export type LoadBalancerPhase = 'deregistration' | 'registration';

/**
 * A load balancer did not confirm a deregistration or registration in time.
 * The load balancer may be left partially transitioned.
 */
export class LoadBalancerWaitTimeoutError extends Error {
  constructor(
    public readonly loadBalancerName: string,
    public readonly phase: LoadBalancerPhase,
    public readonly timeoutMs: number,
    public readonly pendingTargetIds: string[],
  ) {
    super(
      `Timed out after ${timeoutMs}ms waiting for ${phase} on load balancer "${loadBalancerName}" ` +
        `(pending: ${pendingTargetIds.join(', ')})`,
    );
    this.name = 'LoadBalancerWaitTimeoutError';
    Object.setPrototypeOf(this, LoadBalancerWaitTimeoutError.prototype);
  }
}
