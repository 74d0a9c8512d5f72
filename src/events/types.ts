/**
 * Event types
 *
 * Sensor events flow into the engine; zone state and alert events flow out
 * to listeners registered with onEvent().
 */

import type { SensorValue } from '$types/common';
import type { ZoneSnapshot } from '@system/zone';

/**
 * Inbound sensor state change
 * Treated as a point sample; older timestamps than the last accepted one
 * for the same entity are discarded
 */
export interface SensorEvent {
  entityId: string;
  value: SensorValue;
  attributes?: Record<string, unknown>;
  /** Source timestamp (s) */
  timestamp: number;
}

/**
 * Published zone state, emitted whenever it changes
 */
export interface ZoneStateEvent {
  type: typeof EVENT_NAMES.STATE;
  zoneId: string;
  snapshot: ZoneSnapshot;
  timestamp: number;
}

/**
 * Alert kinds raised by a zone
 */
export type ZoneAlertKind =
  | 'temperature_stale'
  | 'temperature_recovered'
  | 'temperature_stuck'
  | 'window_opened'
  | 'window_closed'
  | 'outdoor_unavailable'
  | 'outdoor_recovered'
  | 'auto_power'
  | 'manual_override_expired'
  | 'evaluation_failed';

/**
 * Alert raised by a zone
 */
export interface ZoneAlertEvent {
  type: typeof EVENT_NAMES.ALERT;
  zoneId: string;
  alert: ZoneAlertKind;
  message: string;
  timestamp: number;
}

/**
 * Anything the engine emits
 */
export type EngineEvent = ZoneStateEvent | ZoneAlertEvent;

/**
 * Event names carried in the type field
 */
export const EVENT_NAMES = {
  STATE: 'zone_state',
  ALERT: 'zone_alert'
} as const;
