import { createSerialQueue, withTimeout } from './serial-queue';
import { createSimulatedClock } from './simulated-clock';

describe('createSerialQueue', () => {
  it('should run tasks in enqueue order without overlap', async () => {
    const events: string[] = [];
    const queue = createSerialQueue(vi.fn());

    let releaseFirst: () => void = function() {};
    const firstGate = new Promise<void>(function(resolve) {
      releaseFirst = resolve;
    });

    queue.enqueue('first', async function() {
      events.push('first:start');
      await firstGate;
      events.push('first:end');
    });
    queue.enqueue('second', async function() {
      events.push('second:start');
    });

    await Promise.resolve();
    expect(queue.size()).toBe(2);

    releaseFirst();
    await queue.whenIdle();

    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
    expect(queue.size()).toBe(0);
  });

  it('should report failures and keep running later tasks', async () => {
    const onError = vi.fn();
    const later = vi.fn(async function() {});
    const queue = createSerialQueue(onError);

    queue.enqueue('broken', async function() {
      throw new Error('boom');
    });
    queue.enqueue('later', later);
    await queue.whenIdle();

    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0][0]).toBe('broken');
    expect(later).toHaveBeenCalledTimes(1);
  });
});

describe('withTimeout', () => {
  it('should resolve with the value when the promise settles first', async () => {
    const clock = createSimulatedClock();
    await expect(withTimeout(Promise.resolve(7), 1000, clock.timerApi, 'late')).resolves.toBe(7);
    expect(clock.pendingTimers()).toBe(0);
  });

  it('should reject when the deadline passes first', async () => {
    const clock = createSimulatedClock();
    const never = new Promise<number>(function() {});

    const bounded = withTimeout(never, 1000, clock.timerApi, 'command timed out');
    clock.advance(1000);

    await expect(bounded).rejects.toThrow('command timed out');
  });

  it('should pass rejections through', async () => {
    const clock = createSimulatedClock();
    await expect(
      withTimeout(Promise.reject(new Error('port down')), 1000, clock.timerApi, 'late')
    ).rejects.toThrow('port down');
  });

  it('should return the promise unchanged when the limit is disabled', () => {
    const clock = createSimulatedClock();
    const promise = Promise.resolve(1);
    expect(withTimeout(promise, 0, clock.timerApi, 'late')).toBe(promise);
  });
});
