export { createSensorStore } from './sensors';
export { parseNumericState, parseBinaryState, isNoValueState, isRecord } from './helpers';
export type { SensorSample, SensorReader, SensorStore } from './types';
