/**
 * Geometry Planner
 * Computes the scale and crop steps that make a source frame exactly fill a
 * target frame without distortion.
 *
 * Aspect ratios are compared as exact rationals (integer cross-multiplication),
 * and every division that feeds a `floor` is done on integer products, so the
 * results carry no floating-point drift at crop boundaries.
 */

import { z } from 'zod';

/**
 * Pixel extents of a source or target frame
 */
export interface Dimensions {
  width: number;
  height: number;
}

/**
 * Sub-rectangle of the source frame to keep before scaling
 */
export interface CropRegion {
  width: number;
  height: number;
  /** Left edge offset in pixels */
  x: number;
  /** Top edge offset in pixels */
  y: number;
}

/** Dimension left for the scaler to derive proportionally */
export const AUTO = 'auto' as const;
export type ScaleValue = number | typeof AUTO;

export interface CoverScalePlan {
  mode: 'cover';
  scaleWidth: ScaleValue;
  scaleHeight: ScaleValue;
}

export interface CropThenScalePlan {
  mode: 'crop-then-scale';
  crop: CropRegion;
  scaleTo: Dimensions;
}

export type ScalePlan = CoverScalePlan | CropThenScalePlan;

/**
 * Resolved form of a cover plan: the concrete scaled size and the centered
 * crop that trims it to the target (`null` when the fit is already exact).
 */
export interface ResolvedCover {
  scaled: Dimensions;
  crop: CropRegion | null;
}

export const DimensionsSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

export class InvalidDimensionsError extends Error {
  readonly code = 'INVALID_DIMENSIONS';

  constructor(
    message: string,
    public readonly role: 'source' | 'target'
  ) {
    super(message);
    this.name = 'InvalidDimensionsError';
  }
}

function assertDimensions(value: Dimensions, role: 'source' | 'target'): void {
  const result = DimensionsSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ');
    throw new InvalidDimensionsError(
      `Invalid ${role} dimensions ${value.width}x${value.height} (${issues})`,
      role
    );
  }
}

/**
 * Compares `a.width / a.height` with `b.width / b.height` exactly.
 * Returns 1 when `a` is wider, -1 when it is taller, 0 when equal.
 */
export function compareAspect(a: Dimensions, b: Dimensions): -1 | 0 | 1 {
  const lhs = a.width * b.height;
  const rhs = b.width * a.height;
  if (lhs > rhs) return 1;
  if (lhs < rhs) return -1;
  return 0;
}

/**
 * Plans a cover-by-scale: one axis is pinned to the target, the other is
 * derived proportionally and later center-cropped to the exact target size.
 *
 * @example
 * ```typescript
 * planCoverScale({ width: 1920, height: 1080 }, { width: 1280, height: 720 });
 * // { mode: 'cover', scaleWidth: 1280, scaleHeight: 'auto' }
 * ```
 */
export function planCoverScale(source: Dimensions, target: Dimensions): CoverScalePlan {
  assertDimensions(source, 'source');
  assertDimensions(target, 'target');

  if (compareAspect(source, target) > 0) {
    // Source is wider - pin height, trim width afterwards
    return { mode: 'cover', scaleWidth: AUTO, scaleHeight: target.height };
  }

  // Source is taller or equal - pin width, trim height afterwards
  return { mode: 'cover', scaleWidth: target.width, scaleHeight: AUTO };
}

/**
 * Plans the centered crop that brings the source to the target aspect ratio.
 * Offsets and the cropped extent are truncated, never rounded.
 *
 * @example
 * ```typescript
 * planCropToAspect({ width: 1920, height: 1080 }, { width: 500, height: 700 });
 * // { width: 771, height: 1080, x: 574, y: 0 }
 * ```
 */
export function planCropToAspect(source: Dimensions, target: Dimensions): CropRegion {
  assertDimensions(source, 'source');
  assertDimensions(target, 'target');

  if (compareAspect(source, target) > 0) {
    // Source is wider - crop width, keep full height
    const width = Math.max(1, Math.floor((source.height * target.width) / target.height));
    return {
      width,
      height: source.height,
      x: Math.floor((source.width - width) / 2),
      y: 0,
    };
  }

  // Source is taller or equal - crop height, keep full width
  const height = Math.max(1, Math.floor((source.width * target.height) / target.width));
  return {
    width: source.width,
    height,
    x: 0,
    y: Math.floor((source.height - height) / 2),
  };
}

/**
 * Crop to aspect, then scale to the exact target.
 */
export function planCropThenScale(source: Dimensions, target: Dimensions): CropThenScalePlan {
  const crop = planCropToAspect(source, target);
  return {
    mode: 'crop-then-scale',
    crop,
    scaleTo: { width: target.width, height: target.height },
  };
}

/**
 * Resolves the `auto` axis of a cover plan and the centered crop down to
 * `target`. The derived axis is never smaller than the target's.
 */
export function resolveCoverPlan(
  source: Dimensions,
  target: Dimensions,
  plan: CoverScalePlan = planCoverScale(source, target)
): ResolvedCover {
  let scaled: Dimensions;

  if (plan.scaleWidth === AUTO) {
    const height = target.height;
    scaled = { width: Math.round((source.width * height) / source.height), height };
  } else if (plan.scaleHeight === AUTO) {
    const width = target.width;
    scaled = { width, height: Math.round((source.height * width) / source.width) };
  } else {
    scaled = { width: plan.scaleWidth, height: plan.scaleHeight };
  }

  if (scaled.width === target.width && scaled.height === target.height) {
    return { scaled, crop: null };
  }

  return {
    scaled,
    crop: {
      width: target.width,
      height: target.height,
      x: Math.floor((scaled.width - target.width) / 2),
      y: Math.floor((scaled.height - target.height) / 2),
    },
  };
}

/**
 * True when the crop keeps the whole source frame
 */
export function isFullFrame(crop: CropRegion, source: Dimensions): boolean {
  return crop.x === 0 && crop.y === 0 && crop.width === source.width && crop.height === source.height;
}

/**
 * Parses a `WxH` flag value such as `500x700`
 */
export function parseDimensions(value: string): Dimensions {
  const match = /^(\d+)\s*[xX×]\s*(\d+)$/.exec(value.trim());
  if (!match) {
    throw new InvalidDimensionsError(`Expected WIDTHxHEIGHT, got "${value}"`, 'target');
  }
  const dims = { width: Number(match[1]), height: Number(match[2]) };
  assertDimensions(dims, 'target');
  return dims;
}
