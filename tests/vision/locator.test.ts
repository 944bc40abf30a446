import { describe, expect, it } from 'vitest';

import {
  locate,
  matchTemplate,
  toGrayscale,
  toLogical,
} from '../../src/vision/locator.js';
import type { Image } from '../../src/vision/types.js';
import { grayImage, grid, paste, solidImage } from '../helpers/mocks.js';

/** Distinctive 3x2 patch used as the template throughout */
const PATCH = [
  [200, 40, 220],
  [10, 250, 90],
];

describe('toGrayscale', () => {
  it('applies luma weights to RGB and ignores alpha', () => {
    const image: Image = {
      width: 2,
      height: 1,
      data: new Uint8Array([100, 100, 100, 0, 255, 0, 0, 255]),
    };

    const gray = toGrayscale(image);

    expect(gray.width).toBe(2);
    expect(gray.height).toBe(1);
    expect(gray.data[0]).toBeCloseTo(100, 9);
    expect(gray.data[1]).toBeCloseTo(76.245, 9);
  });

  it('rejects data shorter than the dimensions', () => {
    expect(() =>
      toGrayscale({ width: 2, height: 2, data: new Uint8Array(4) })
    ).toThrow('Image data too short for 2x2: 4 bytes');
  });
});

describe('matchTemplate', () => {
  it('finds the exact offset of an embedded patch', () => {
    const capture = toGrayscale(grayImage(paste(grid(8, 6, 120), PATCH, 4, 3)));
    const template = toGrayscale(grayImage(PATCH));

    const result = matchTemplate(capture, template);

    expect(result.offset).toEqual({ x: 4, y: 3 });
    expect(result.confidence).toBeCloseTo(1, 6);
  });

  it('scores flat templates as 0', () => {
    const capture = toGrayscale(grayImage(paste(grid(5, 5, 0), PATCH, 1, 1)));
    const template = toGrayscale(solidImage(2, 2, 50));

    expect(matchTemplate(capture, template)).toEqual({
      offset: { x: 0, y: 0 },
      confidence: 0,
    });
  });

  it('returns no score when the template is larger than the capture', () => {
    const result = matchTemplate(
      toGrayscale(solidImage(2, 2)),
      toGrayscale(grayImage(PATCH))
    );

    expect(result.confidence).toBe(0);
  });
});

describe('locate', () => {
  it('reports found with the center of the best window', () => {
    const capture = grayImage(paste(grid(10, 8, 30), PATCH, 5, 2));

    const result = locate(capture, grayImage(PATCH), 0.9);

    expect(result.found).toBe(true);
    expect(result.offset).toEqual({ x: 5, y: 2 });
    // 3x2 template: center offset (1, 1)
    expect(result.center).toEqual({ x: 6, y: 3 });
  });

  it('is not found when the best score is below the threshold', () => {
    // Capture is the inverted patch: the only window correlates at -1
    const inverted = PATCH.map((row) => row.map((v) => 255 - v));

    const result = locate(grayImage(inverted), grayImage(PATCH), 0.8);

    expect(result.found).toBe(false);
    expect(result.confidence).toBeCloseTo(-1, 6);
  });

  it('is never found when the template does not fit', () => {
    const result = locate(solidImage(2, 1), grayImage(PATCH), 0);

    expect(result.found).toBe(false);
  });
});

describe('toLogical', () => {
  it('halves coordinates on a 2x capture', () => {
    expect(
      toLogical(
        { x: 80, y: 60 },
        { width: 200, height: 200 },
        { width: 100, height: 100 }
      )
    ).toEqual({ x: 40, y: 30 });
  });

  it('is the identity when sizes match', () => {
    expect(
      toLogical(
        { x: 123, y: 45 },
        { width: 1920, height: 1080 },
        { width: 1920, height: 1080 }
      )
    ).toEqual({ x: 123, y: 45 });
  });

  it('scales each axis independently and truncates', () => {
    expect(
      toLogical(
        { x: 101, y: 99 },
        { width: 300, height: 200 },
        { width: 200, height: 100 }
      )
    ).toEqual({ x: 67, y: 49 });
  });
});
