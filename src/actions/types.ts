/**
 * Action adapter boundary
 *
 * Handlers never touch input injection or screen capture directly; they go
 * through an ActionAdapter. The desktop adapter drives the real session,
 * the simulated adapter records calls and returns fixed stand-ins.
 */

import type { Image, Size } from '../vision/types.js';

export type MouseButton = 'left' | 'right' | 'middle';

export type ButtonAction = 'click' | 'down' | 'up';

export type KeyAction = 'down' | 'up' | 'press';

export interface ActionAdapter {
  moveTo(x: number, y: number): Promise<void>;
  click(button: MouseButton): Promise<void>;
  buttonDown(button: MouseButton): Promise<void>;
  buttonUp(button: MouseButton): Promise<void>;
  keyDown(key: string): Promise<void>;
  keyUp(key: string): Promise<void>;
  keyPress(key: string): Promise<void>;
  typeText(text: string): Promise<void>;
  /** Full-screen capture in capture pixels (may be larger than logical size) */
  captureScreen(): Promise<Image>;
  /** Size of the coordinate space moveTo() works in */
  logicalScreenSize(): Promise<Size>;
  /** Resolves null when the file does not exist */
  loadImage(path: string): Promise<Image | null>;
}
