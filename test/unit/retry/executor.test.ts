import { RetryExecutor } from '../../../src/retry/executor.js';
import { defaultConfig } from '../../../src/config/loader.js';
import { FakeClock } from '../../helpers/fakes.js';

function failing(times: number, value = 'ok') {
  let calls = 0;
  const op = async () => {
    calls++;
    if (calls <= times) throw new Error(`failure ${calls}`);
    return value;
  };
  return { op, calls: () => calls };
}

describe('RetryExecutor', () => {
  it('returns the first success with linear backoff between attempts', async () => {
    const clock = new FakeClock();
    const { op, calls } = failing(2);

    const result = await new RetryExecutor({ maxAttempts: 3, baseBackoffMs: 100 }, clock).execute(op);

    expect(result).toBe('ok');
    expect(calls()).toBe(3);
    expect(clock.sleeps).toEqual([100, 200]);
  });

  it('propagates the final failure once attempts run out', async () => {
    const clock = new FakeClock();
    const { op, calls } = failing(5);

    await expect(new RetryExecutor({ maxAttempts: 3, baseBackoffMs: 100 }, clock).execute(op)).rejects.toThrow('failure 3');
    expect(calls()).toBe(3);
    expect(clock.sleeps).toEqual([100, 200]);
  });

  it('waits the same interval every time in fixed mode', async () => {
    const clock = new FakeClock();
    const { op } = failing(3);

    await new RetryExecutor({ maxAttempts: 4, baseBackoffMs: 250, backoff: 'fixed' }, clock).execute(op);

    expect(clock.sleeps).toEqual([250, 250, 250]);
  });

  it('does not retry failures that shouldRetry rejects', async () => {
    const clock = new FakeClock();
    const { op, calls } = failing(2);

    await expect(
      new RetryExecutor({ maxAttempts: 3, baseBackoffMs: 100 }, clock).execute(op, { shouldRetry: () => false }),
    ).rejects.toThrow('failure 1');
    expect(calls()).toBe(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('lets per-call options override the defaults', async () => {
    const clock = new FakeClock();
    const { op, calls } = failing(5);

    await expect(
      new RetryExecutor({ maxAttempts: 3, baseBackoffMs: 100 }, clock).execute(op, { maxAttempts: 1 }),
    ).rejects.toThrow('failure 1');
    expect(calls()).toBe(1);
  });

  it('builds its policy from the retry section of the config', async () => {
    const clock = new FakeClock();
    const { op } = failing(2);

    await RetryExecutor.fromConfig(defaultConfig(), clock).execute(op);

    expect(clock.sleeps).toEqual([2000, 4000]);
  });
});
