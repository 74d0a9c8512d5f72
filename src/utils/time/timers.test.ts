import { createSimulatedClock } from './simulated-clock';
import { createDelayedAction } from './timers';

describe('createDelayedAction', () => {
  it('should fire once at the due time', () => {
    const clock = createSimulatedClock();
    const callback = vi.fn();

    const action = createDelayedAction(clock.timerApi, clock.now, 30, callback);

    expect(action.dueAt).toBe(30);
    expect(action.status()).toBe('pending');

    clock.advance(29999);
    expect(callback).not.toHaveBeenCalled();

    clock.advance(1);
    expect(callback).toHaveBeenCalledTimes(1);
    expect(action.status()).toBe('fired');
  });

  it('should never fire after cancellation', () => {
    const clock = createSimulatedClock();
    const callback = vi.fn();

    const action = createDelayedAction(clock.timerApi, clock.now, 30, callback);

    expect(action.cancel()).toBe(true);
    clock.advance(60000);

    expect(callback).not.toHaveBeenCalled();
    expect(action.status()).toBe('cancelled');
  });

  it('should report nothing cancelled once fired', () => {
    const clock = createSimulatedClock();
    const action = createDelayedAction(clock.timerApi, clock.now, 1, vi.fn());

    clock.advance(1000);

    expect(action.cancel()).toBe(false);
    expect(action.status()).toBe('fired');
  });

  it('should measure the due time from the current clock', () => {
    const clock = createSimulatedClock(10000);
    const action = createDelayedAction(clock.timerApi, clock.now, 60, vi.fn());
    expect(action.dueAt).toBe(70);
  });
});
