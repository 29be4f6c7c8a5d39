import { Logger } from '@nestjs/common';

/**
 * Silences NestJS Logger warn/error output for noisy test scenarios.
 * Returns a restore function to reinstate original behavior.
 */
export function silenceNestLogger(): () => void {
  const spies = [
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined),
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined),
  ];

  return () => {
    spies.forEach((spy) => spy.mockRestore());
  };
}
