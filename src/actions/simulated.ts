/**
 * Simulation adapter: records every call instead of touching the desktop
 */

import {
  SIMULATED_SCREEN_HEIGHT,
  SIMULATED_SCREEN_WIDTH,
} from '../utils/constants.js';
import { readPngFile } from '../vision/png.js';
import type { Image, Size } from '../vision/types.js';
import type { ActionAdapter, MouseButton } from './types.js';

export type RecordedAction =
  | { type: 'moveTo'; x: number; y: number }
  | { type: 'click'; button: MouseButton }
  | { type: 'buttonDown'; button: MouseButton }
  | { type: 'buttonUp'; button: MouseButton }
  | { type: 'keyDown'; key: string }
  | { type: 'keyUp'; key: string }
  | { type: 'keyPress'; key: string }
  | { type: 'typeText'; text: string }
  | { type: 'captureScreen' }
  | { type: 'loadImage'; path: string };

export interface SimulatedAdapterOptions {
  /** Logical screen size (default 1920x1080) */
  screenSize?: Size;
  /** Frame returned by captureScreen (default 1x1 black) */
  screen?: Image;
  /** Template source (default: PNG files on disk) */
  imageLoader?: (path: string) => Image | null;
}

function blankImage(width: number, height: number): Image {
  const data = new Uint8Array(width * height * 4);
  for (let i = 3; i < data.length; i += 4) data[i] = 255;
  return { width, height, data };
}

export class SimulatedActionAdapter implements ActionAdapter {
  readonly actions: RecordedAction[] = [];
  private readonly screenSize: Size;
  private readonly screen: Image;
  private readonly imageLoader: (path: string) => Image | null;

  constructor(options: SimulatedAdapterOptions = {}) {
    this.screenSize = options.screenSize ?? {
      width: SIMULATED_SCREEN_WIDTH,
      height: SIMULATED_SCREEN_HEIGHT,
    };
    this.screen = options.screen ?? blankImage(1, 1);
    this.imageLoader = options.imageLoader ?? readPngFile;
  }

  moveTo(x: number, y: number): Promise<void> {
    this.actions.push({ type: 'moveTo', x, y });
    return Promise.resolve();
  }

  click(button: MouseButton): Promise<void> {
    this.actions.push({ type: 'click', button });
    return Promise.resolve();
  }

  buttonDown(button: MouseButton): Promise<void> {
    this.actions.push({ type: 'buttonDown', button });
    return Promise.resolve();
  }

  buttonUp(button: MouseButton): Promise<void> {
    this.actions.push({ type: 'buttonUp', button });
    return Promise.resolve();
  }

  keyDown(key: string): Promise<void> {
    this.actions.push({ type: 'keyDown', key });
    return Promise.resolve();
  }

  keyUp(key: string): Promise<void> {
    this.actions.push({ type: 'keyUp', key });
    return Promise.resolve();
  }

  keyPress(key: string): Promise<void> {
    this.actions.push({ type: 'keyPress', key });
    return Promise.resolve();
  }

  typeText(text: string): Promise<void> {
    this.actions.push({ type: 'typeText', text });
    return Promise.resolve();
  }

  captureScreen(): Promise<Image> {
    this.actions.push({ type: 'captureScreen' });
    return Promise.resolve(this.screen);
  }

  logicalScreenSize(): Promise<Size> {
    return Promise.resolve(this.screenSize);
  }

  async loadImage(path: string): Promise<Image | null> {
    this.actions.push({ type: 'loadImage', path });
    return this.imageLoader(path);
  }
}
