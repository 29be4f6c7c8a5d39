/**
 * Raised when a caller passes the wrong kind of entity or a malformed request.
 * Always thrown before any remote call is made.
 */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
    Object.setPrototypeOf(this, InvalidArgumentError.prototype);
  }
}
