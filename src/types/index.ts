export type * from './common';
export type * from './config';
export {
  ValidationError,
  ConfigurationError,
  InvalidPresetError,
  InvalidTemperatureError,
  ZoneNotFoundError,
  SensorUnavailableError,
  ActuatorCommandError
} from './errors';
export type { ConfigIssue } from './errors';
