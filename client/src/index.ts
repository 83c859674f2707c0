/**
 * Entry point for the package.
 * Re-exports the controller and its helpers via a cleaner API.
 */

export {
  AutogrowController,
  DEFAULT_RESIZE_DURATION,
} from './controllers/AutogrowController';
export { coreControllerDefinitions } from './controllers';
export { HeightConstraint } from './includes/heightConstraint';
export {
  getBoxMetrics,
  measureIdealHeight,
  NORMAL_LINE_HEIGHT,
} from './includes/boxMetrics';
export { initStimulus } from './includes/initStimulus';
export {
  clampHeight,
  formatResizableHeight,
  parseResizableHeight,
  resolveResizableHeight,
} from './utils/resizableHeight';
export type { ResizableHeight } from './utils/resizableHeight';
