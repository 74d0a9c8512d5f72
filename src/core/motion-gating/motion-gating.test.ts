import { createMotionState, recordMotion, updateMotionGating } from './motion-gating';

describe('motion-gating', () => {
  const config = { enabled: true, absenceSec: 1800 };

  it('should not block before the absence period', () => {
    const state = createMotionState(0);
    expect(updateMotionGating(state, 1799, config)).toEqual({ blocking: false, absentSec: 1799, changed: false });
  });

  it('should block after the absence period', () => {
    const state = createMotionState(0);
    expect(updateMotionGating(state, 1800, config)).toEqual({ blocking: true, absentSec: 1800, changed: true });
    expect(state.absent).toBe(true);
  });

  it('should never block while motion is active', () => {
    const state = createMotionState(0);
    recordMotion(state, true, 10);
    expect(updateMotionGating(state, 5000, config).blocking).toBe(false);
  });

  it('should count absence from when motion ended', () => {
    const state = createMotionState(0);
    recordMotion(state, true, 100);
    recordMotion(state, false, 400);
    expect(state.lastMotionTime).toBe(400);
    expect(updateMotionGating(state, 2199, config).blocking).toBe(false);
    expect(updateMotionGating(state, 2200, config).blocking).toBe(true);
  });

  it('should unblock when motion returns', () => {
    const state = createMotionState(0);
    updateMotionGating(state, 2000, config);
    recordMotion(state, true, 2010);
    expect(updateMotionGating(state, 2010, config)).toEqual({ blocking: false, absentSec: 0, changed: true });
  });

  it('should never block when disabled', () => {
    const state = createMotionState(0);
    expect(updateMotionGating(state, 10000, { enabled: false, absenceSec: 1800 }).blocking).toBe(false);
  });
});
