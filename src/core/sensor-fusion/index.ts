export { resolveOutdoorTemperature, readWeatherTemperature } from './sensor-fusion';
export type { OutdoorSource, OutdoorInputs, OutdoorReading } from './types';
