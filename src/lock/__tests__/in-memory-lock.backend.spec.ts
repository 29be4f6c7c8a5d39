import { InMemoryLockBackend } from '../in-memory-lock.backend';
import type { LockConfig } from '../../config/config.types';

describe('InMemoryLockBackend', () => {
  const config: LockConfig = {
    backend: 'memory',
    name: 'deploy',
    nodeId: 'node-1',
    maxWaitMs: 1000,
    leaseMs: 60000,
    pollIntervalMs: 100,
    redis: { host: 'localhost', port: 6379, db: 0, keyPrefix: 'rollout:lock:' },
    http: { url: '', apiKey: '', timeout: 1000 },
  };

  let backend: InMemoryLockBackend;

  beforeEach(() => {
    jest.useFakeTimers();
    backend = new InMemoryLockBackend(config);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should grant a free lock immediately', async () => {
    const token = await backend.acquire('deploy', 1000);

    expect(token?.name).toBe('deploy');
    expect(token?.value).toMatch(/^node-1:/);
  });

  it('should keep locks with different names independent', async () => {
    await backend.acquire('deploy', 1000);
    await expect(backend.acquire('other', 1000)).resolves.not.toBeNull();
  });

  it('should time out while another holder keeps the lock', async () => {
    await backend.acquire('deploy', 1000);

    const second = backend.acquire('deploy', 300);
    await jest.advanceTimersByTimeAsync(300);

    await expect(second).resolves.toBeNull();
  });

  it('should hand the lock to a waiter once it is released', async () => {
    const first = await backend.acquire('deploy', 1000);
    const second = backend.acquire('deploy', 1000);

    if (!first) {
      throw new Error('expected the first acquire to succeed');
    }
    await backend.release(first);
    await jest.advanceTimersByTimeAsync(100);

    const token = await second;
    expect(token?.name).toBe('deploy');
    expect(token?.value).not.toBe(first.value);
  });

  it('should extend only the current holder', async () => {
    const token = await backend.acquire('deploy', 1000);
    if (!token) {
      throw new Error('expected the acquire to succeed');
    }

    await expect(backend.extend(token)).resolves.toBe(true);
    await expect(backend.extend({ name: 'deploy', value: 'someone-else' })).resolves.toBe(false);

    await backend.release(token);
    await expect(backend.extend(token)).resolves.toBe(false);
  });

  it('should ignore a release with a stale token', async () => {
    const token = await backend.acquire('deploy', 1000);
    if (!token) {
      throw new Error('expected the acquire to succeed');
    }

    await backend.release({ name: 'deploy', value: 'someone-else' });

    await expect(backend.extend(token)).resolves.toBe(true);
  });
});
