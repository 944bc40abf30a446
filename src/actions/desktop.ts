/**
 * Desktop adapter for X11 sessions
 *
 * Input goes through `xdotool`; screen captures come from ImageMagick
 * `import -window root` as PNG on stdout.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';

import { errorMessage, TemplateError } from '../core/errors.js';
import { decodePng, readPngFile } from '../vision/png.js';
import type { Image, Size } from '../vision/types.js';
import type { ActionAdapter, MouseButton } from './types.js';

const execFileAsync = promisify(execFile);

/** Upper bound for a captured PNG on stdout */
const CAPTURE_MAX_BUFFER = 256 * 1024 * 1024;

const BUTTON_NUMBERS: Record<MouseButton, string> = {
  left: '1',
  middle: '2',
  right: '3',
};

/**
 * Macro key names -> X keysyms; anything else passes through unchanged
 */
const KEY_NAMES: Record<string, string> = {
  enter: 'Return',
  return: 'Return',
  esc: 'Escape',
  escape: 'Escape',
  tab: 'Tab',
  space: 'space',
  backspace: 'BackSpace',
  delete: 'Delete',
  del: 'Delete',
  insert: 'Insert',
  home: 'Home',
  end: 'End',
  pageup: 'Page_Up',
  pagedown: 'Page_Down',
  up: 'Up',
  down: 'Down',
  left: 'Left',
  right: 'Right',
  ctrl: 'ctrl',
  ctrlleft: 'Control_L',
  ctrlright: 'Control_R',
  shift: 'shift',
  shiftleft: 'Shift_L',
  shiftright: 'Shift_R',
  alt: 'alt',
  altleft: 'Alt_L',
  altright: 'Alt_R',
  win: 'super',
  super: 'super',
  capslock: 'Caps_Lock',
  printscreen: 'Print',
};

/**
 * Translate a macro key name to an xdotool key argument
 */
export function toKeysym(key: string): string {
  const lower = key.toLowerCase();
  const mapped = KEY_NAMES[lower];
  if (mapped) return mapped;
  if (/^f\d{1,2}$/.test(lower)) return lower.toUpperCase();
  return key;
}

export type CommandRunner = (
  file: string,
  args: string[]
) => Promise<Buffer>;

async function runCommand(file: string, args: string[]): Promise<Buffer> {
  const { stdout } = await execFileAsync(file, args, {
    encoding: 'buffer',
    maxBuffer: CAPTURE_MAX_BUFFER,
  });
  return stdout;
}

export class DesktopActionAdapter implements ActionAdapter {
  constructor(private readonly run: CommandRunner = runCommand) {}

  private async xdotool(...args: string[]): Promise<void> {
    await this.run('xdotool', args);
  }

  moveTo(x: number, y: number): Promise<void> {
    return this.xdotool('mousemove', '--sync', String(x), String(y));
  }

  click(button: MouseButton): Promise<void> {
    return this.xdotool('click', BUTTON_NUMBERS[button]);
  }

  buttonDown(button: MouseButton): Promise<void> {
    return this.xdotool('mousedown', BUTTON_NUMBERS[button]);
  }

  buttonUp(button: MouseButton): Promise<void> {
    return this.xdotool('mouseup', BUTTON_NUMBERS[button]);
  }

  keyDown(key: string): Promise<void> {
    return this.xdotool('keydown', toKeysym(key));
  }

  keyUp(key: string): Promise<void> {
    return this.xdotool('keyup', toKeysym(key));
  }

  keyPress(key: string): Promise<void> {
    return this.xdotool('key', toKeysym(key));
  }

  typeText(text: string): Promise<void> {
    return this.xdotool('type', '--', text);
  }

  async captureScreen(): Promise<Image> {
    let png: Buffer;
    try {
      png = await this.run('import', ['-window', 'root', 'png:-']);
    } catch (error) {
      throw new TemplateError(`Screen capture failed: ${errorMessage(error)}`);
    }
    return decodePng(png);
  }

  async logicalScreenSize(): Promise<Size> {
    const output = (await this.run('xdotool', ['getdisplaygeometry']))
      .toString()
      .trim();
    const match = /^(\d+)\s+(\d+)$/.exec(output);
    if (!match) {
      throw new TemplateError(`Unexpected display geometry: ${output}`);
    }
    return { width: Number(match[1]), height: Number(match[2]) };
  }

  async loadImage(path: string): Promise<Image | null> {
    return readPngFile(path);
  }
}
