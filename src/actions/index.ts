/**
 * Action adapters
 */

import type { RunMode } from '../types/index.js';
import { DesktopActionAdapter } from './desktop.js';
import { SimulatedActionAdapter } from './simulated.js';
import type { ActionAdapter } from './types.js';

export type {
  ActionAdapter,
  ButtonAction,
  KeyAction,
  MouseButton,
} from './types.js';
export { DesktopActionAdapter, toKeysym } from './desktop.js';
export {
  type RecordedAction,
  SimulatedActionAdapter,
} from './simulated.js';

/**
 * Adapter for a run mode; only `execute` touches the desktop
 */
export function createActionAdapter(mode: RunMode): ActionAdapter {
  return mode === 'execute'
    ? new DesktopActionAdapter()
    : new SimulatedActionAdapter();
}
