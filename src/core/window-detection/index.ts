export {
  WINDOW_CONSTANTS,
  createWindowState,
  recordTemperatureSample,
  updateWindowDetection,
  windowBlock
} from './window-detection';
export type {
  WindowState,
  WindowSource,
  WindowCandidate,
  WindowCause,
  WindowEvent,
  WindowBlock
} from './types';
