/**
 * A deployment did not reach `successful` before its deadline.
 */
export class DeployTimeoutError extends Error {
  constructor(
    public readonly deploymentId: string,
    public readonly timeoutMs: number,
  ) {
    super(`Deployment ${deploymentId} did not complete within ${timeoutMs}ms`);
    this.name = 'DeployTimeoutError';
    Object.setPrototypeOf(this, DeployTimeoutError.prototype);
  }
}

/**
 * A deployment reached the terminal `failed` status.
 */
export class DeployFailedError extends Error {
  constructor(public readonly deploymentId: string) {
    super(`Deployment ${deploymentId} failed`);
    this.name = 'DeployFailedError';
    Object.setPrototypeOf(this, DeployFailedError.prototype);
  }
}
