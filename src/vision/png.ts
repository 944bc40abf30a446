/**
 * PNG decoding for templates and screen captures
 */

import * as fs from 'fs';
import { PNG } from 'pngjs';

import { errorMessage, TemplateError } from '../core/errors.js';
import type { Image } from './types.js';

/**
 * Decode PNG bytes into an RGBA image
 */
export function decodePng(buffer: Buffer): Image {
  try {
    const png = PNG.sync.read(buffer);
    return { width: png.width, height: png.height, data: png.data };
  } catch (error) {
    throw new TemplateError(`Invalid PNG data: ${errorMessage(error)}`);
  }
}

/**
 * Read a PNG file; null when the file does not exist
 */
export function readPngFile(filePath: string): Image | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }
  return decodePng(fs.readFileSync(filePath));
}
