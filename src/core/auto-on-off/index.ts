export { AUTO_ON_OFF_ACTIONS, evaluateAutoOnOff, resolvePowerChange } from './auto-on-off';
export type { AutoOnOffAction, AutoOnOffReason, AutoOnOffDecision, AutoPowerChange } from './types';
