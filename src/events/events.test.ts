/**
 * Tests for event types
 */

import { EVENT_NAMES } from './types';
import type { EngineEvent } from './types';

describe('Event Types', () => {
  describe('EVENT_NAMES', () => {
    it('should have correct event names', () => {
      expect(EVENT_NAMES.STATE).toBe('zone_state');
      expect(EVENT_NAMES.ALERT).toBe('zone_alert');
    });
  });

  describe('EngineEvent', () => {
    function describeEvent(event: EngineEvent): string {
      return event.type === EVENT_NAMES.ALERT ? event.alert : event.snapshot.mode;
    }

    it('should narrow on the type field', () => {
      expect(describeEvent({
        type: EVENT_NAMES.ALERT,
        zoneId: 'living',
        alert: 'window_opened',
        message: 'Window open (sensor_open)',
        timestamp: 120
      })).toBe('window_opened');
    });
  });
});
