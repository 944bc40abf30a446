/**
 * Package metadata lookup
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';

/**
 * Version from the nearest package.json above this module
 * Works from both the TypeScript sources and the compiled dist/ tree
 */
export function readPackageVersion(): string {
  let dir = path.dirname(fileURLToPath(import.meta.url));

  for (;;) {
    const candidate = path.join(dir, 'package.json');
    if (fs.existsSync(candidate)) {
      const pkg: unknown = JSON.parse(fs.readFileSync(candidate, 'utf-8'));
      if (
        typeof pkg === 'object' &&
        pkg !== null &&
        'version' in pkg &&
        typeof pkg.version === 'string'
      ) {
        return pkg.version;
      }
      return '0.0.0';
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return '0.0.0';
    }
    dir = parent;
  }
}
