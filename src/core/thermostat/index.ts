export { calculateThresholds, decideHeating } from './thermostat';
export { checkMinOff } from './helpers';
export type { HeatingThresholds, MinOffCheckResult } from './types';
