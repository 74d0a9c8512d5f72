/**
 * Tests for sensor health helper functions
 */

import { checkNoReading, checkStuckSensor, isSampleExpired } from './helpers';

describe('Sensor Health Helpers', () => {
  describe('checkNoReading', () => {
    it('should return not stale when sensor provides reading', () => {
      const result = checkNoReading(20.5, 1000, 990, 600);
      expect(result.stale).toBe(false);
      expect(result.duration).toBe(0);
    });

    it('should return stale when silence exceeds timeout', () => {
      const result = checkNoReading(null, 1000, 300, 600);
      expect(result.stale).toBe(true);
      expect(result.duration).toBe(700);
    });

    it('should return not stale exactly at the timeout', () => {
      const result = checkNoReading(null, 1000, 400, 600);
      expect(result.stale).toBe(false);
      expect(result.duration).toBe(600);
    });

    it('should clamp a backwards clock to zero', () => {
      const result = checkNoReading(null, 1000, 1010, 600);
      expect(result.stale).toBe(false);
      expect(result.duration).toBe(0);
    });
  });

  describe('isSampleExpired', () => {
    it('should keep a sample inside the timeout', () => {
      expect(isSampleExpired(400, 1000, 600)).toBe(false);
    });

    it('should expire a sample older than the timeout', () => {
      expect(isSampleExpired(399, 1000, 600)).toBe(true);
    });
  });

  describe('checkStuckSensor', () => {
    it('should return not stuck when no reading', () => {
      const result = checkStuckSensor(null, 20.0, 1000, 700, 300, 0.05);
      expect(result).toEqual({ stuck: false, duration: 0, changed: false });
    });

    it('should return changed for first reading', () => {
      const result = checkStuckSensor(20.0, null, 1000, 1000, 300, 0.05);
      expect(result).toEqual({ stuck: false, duration: 0, changed: true });
    });

    it('should return stuck when value unchanged beyond threshold', () => {
      const result = checkStuckSensor(20.0, 20.0, 1000, 600, 300, 0.05);
      expect(result).toEqual({ stuck: true, duration: 400, changed: false });
    });

    it('should never report stuck when detection is disabled', () => {
      const result = checkStuckSensor(20.0, 20.0, 100000, 0, 0, 0.05);
      expect(result.stuck).toBe(false);
      expect(result.changed).toBe(false);
    });

    it('should consider change at exactly epsilon as unchanged', () => {
      const result = checkStuckSensor(20.5, 20.0, 1000, 600, 300, 0.5);
      expect(result.stuck).toBe(true);
      expect(result.changed).toBe(false);
    });

    it('should handle negative temperature changes', () => {
      const result = checkStuckSensor(-10.1, -10.0, 1000, 700, 300, 0.05);
      expect(result.changed).toBe(true);
    });
  });
});
