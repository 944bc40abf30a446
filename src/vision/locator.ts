/**
 * Template matching over screen captures
 *
 * Zero-mean normalized cross-correlation of a template against every
 * offset of a capture, plus the rescale from capture pixels to the logical
 * coordinate space used by mouse actions.
 */

import { TemplateError } from '../core/errors.js';
import type { GrayImage, Image, MatchResult, Point, Size } from './types.js';

/** Luma weights (ITU-R BT.601) */
const WEIGHT_R = 0.299;
const WEIGHT_G = 0.587;
const WEIGHT_B = 0.114;

/** Variance below this counts as a flat region */
const FLAT_EPSILON = 1e-9;

/**
 * Convert an RGBA image to single-channel intensity
 */
export function toGrayscale(image: Image): GrayImage {
  const { width, height, data } = image;
  const pixels = width * height;
  if (data.length < pixels * 4) {
    throw new TemplateError(
      `Image data too short for ${width}x${height}: ${data.length} bytes`
    );
  }

  const gray = new Float64Array(pixels);
  for (let p = 0; p < pixels; p++) {
    const o = p * 4;
    gray[p] =
      WEIGHT_R * (data[o] ?? 0) +
      WEIGHT_G * (data[o + 1] ?? 0) +
      WEIGHT_B * (data[o + 2] ?? 0);
  }
  return { width, height, data: gray };
}

/**
 * Summed-area tables of values and squared values, (w+1) x (h+1)
 */
function integralImages(image: GrayImage): { sum: Float64Array; sumSq: Float64Array } {
  const stride = image.width + 1;
  const sum = new Float64Array(stride * (image.height + 1));
  const sumSq = new Float64Array(stride * (image.height + 1));

  for (let y = 0; y < image.height; y++) {
    let rowSum = 0;
    let rowSumSq = 0;
    for (let x = 0; x < image.width; x++) {
      const v = image.data[y * image.width + x] ?? 0;
      rowSum += v;
      rowSumSq += v * v;
      const i = (y + 1) * stride + (x + 1);
      sum[i] = (sum[i - stride] ?? 0) + rowSum;
      sumSq[i] = (sumSq[i - stride] ?? 0) + rowSumSq;
    }
  }

  return { sum, sumSq };
}

function boxSum(
  table: Float64Array,
  stride: number,
  x: number,
  y: number,
  w: number,
  h: number
): number {
  const a = table[y * stride + x] ?? 0;
  const b = table[y * stride + x + w] ?? 0;
  const c = table[(y + h) * stride + x] ?? 0;
  const d = table[(y + h) * stride + x + w] ?? 0;
  return d - b - c + a;
}

/**
 * Best normalized cross-correlation offset of template inside capture
 *
 * Scores are in [-1, 1]; flat windows and flat templates score 0. Ties keep
 * the first offset in row-major order.
 */
export function matchTemplate(
  capture: GrayImage,
  template: GrayImage
): { offset: Point; confidence: number } {
  const w = template.width;
  const h = template.height;
  const n = w * h;

  if (n === 0 || w > capture.width || h > capture.height) {
    return { offset: { x: 0, y: 0 }, confidence: 0 };
  }

  let tMean = 0;
  for (let i = 0; i < n; i++) tMean += template.data[i] ?? 0;
  tMean /= n;

  const tDiff = new Float64Array(n);
  let tVar = 0;
  for (let i = 0; i < n; i++) {
    const d = (template.data[i] ?? 0) - tMean;
    tDiff[i] = d;
    tVar += d * d;
  }

  const best = { offset: { x: 0, y: 0 }, confidence: 0 };
  if (tVar <= FLAT_EPSILON * n) {
    return best;
  }
  const tNorm = Math.sqrt(tVar);

  const { sum, sumSq } = integralImages(capture);
  const stride = capture.width + 1;
  let bestScore = -Infinity;

  for (let y = 0; y + h <= capture.height; y++) {
    for (let x = 0; x + w <= capture.width; x++) {
      const s = boxSum(sum, stride, x, y, w, h);
      const windowVar = boxSum(sumSq, stride, x, y, w, h) - (s * s) / n;

      let score = 0;
      if (windowVar > FLAT_EPSILON * n) {
        // sum(tDiff) is 0, so the window mean drops out of the numerator
        let cross = 0;
        for (let ty = 0; ty < h; ty++) {
          const row = (y + ty) * capture.width + x;
          for (let tx = 0; tx < w; tx++) {
            cross += (tDiff[ty * w + tx] ?? 0) * (capture.data[row + tx] ?? 0);
          }
        }
        score = Math.max(-1, Math.min(1, cross / (tNorm * Math.sqrt(windowVar))));
      }

      if (score > bestScore) {
        bestScore = score;
        best.offset = { x, y };
        best.confidence = score;
      }
    }
  }

  return best;
}

/**
 * Search template inside capture; found when confidence >= threshold
 *
 * @param threshold - Fraction in [0, 1]
 */
export function locate(
  capture: Image,
  template: Image,
  threshold: number
): MatchResult {
  const { offset, confidence } = matchTemplate(
    toGrayscale(capture),
    toGrayscale(template)
  );

  const fits = template.width <= capture.width && template.height <= capture.height;

  return {
    found: fits && confidence >= threshold,
    offset,
    center: {
      x: offset.x + Math.floor(template.width / 2),
      y: offset.y + Math.floor(template.height / 2),
    },
    confidence,
  };
}

/**
 * Map a capture-pixel point into logical screen coordinates
 *
 * Applied on every match; equal sizes give a scale of 1.
 */
export function toLogical(
  point: Point,
  captureSize: Size,
  logicalSize: Size
): Point {
  const scaleX = captureSize.width / logicalSize.width;
  const scaleY = captureSize.height / logicalSize.height;
  return {
    x: Math.trunc(point.x / scaleX),
    y: Math.trunc(point.y / scaleY),
  };
}
