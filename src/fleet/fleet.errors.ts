/**
 * A fleet API call failed at the transport level or returned a payload
 * that does not match the expected shape.
 */
export class FleetRequestError extends Error {
  constructor(
    message: string,
    public readonly method: string,
    public readonly url: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'FleetRequestError';
    Object.setPrototypeOf(this, FleetRequestError.prototype);
  }
}
