import { NotReadyError } from '../services/errors';
import type { EdgeInsets, TargetBounds, TargetGeometry, Viewport } from '../components/Spotlight/types';

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

function clampNonNegative(value: number): number {
  return Number.isFinite(value) ? Math.max(0, value) : 0;
}

function isMeasured(bounds: TargetBounds | null | undefined): bounds is TargetBounds {
  return (
    bounds != null &&
    Number.isFinite(bounds.left) &&
    Number.isFinite(bounds.top) &&
    Number.isFinite(bounds.width) &&
    Number.isFinite(bounds.height)
  );
}

export interface ResolveOptions {
  /** Intersect the padded rectangle with the viewport. */
  clampToViewport?: boolean;
}

/**
 * Inflates the target's bounds by `padding` and derives its edges and center.
 * Throws {@link NotReadyError} while the host layout has not measured the target.
 */
export function resolveTargetGeometry(
  targetBounds: TargetBounds | null | undefined,
  padding: EdgeInsets,
  viewport: Viewport,
  options?: ResolveOptions
): TargetGeometry {
  if (!isMeasured(targetBounds)) {
    throw new NotReadyError();
  }

  let left = targetBounds.left - padding.left;
  let top = targetBounds.top - padding.top;
  let width = clampNonNegative(targetBounds.width + padding.left + padding.right);
  let height = clampNonNegative(targetBounds.height + padding.top + padding.bottom);

  if (options?.clampToViewport) {
    const viewportWidth = clampNonNegative(viewport.width);
    const viewportHeight = clampNonNegative(viewport.height);
    const right = clamp(left + width, 0, viewportWidth);
    const bottom = clamp(top + height, 0, viewportHeight);
    left = clamp(left, 0, viewportWidth);
    top = clamp(top, 0, viewportHeight);
    width = clampNonNegative(right - left);
    height = clampNonNegative(bottom - top);
  }

  return {
    left,
    top,
    width,
    height,
    right: left + width,
    bottom: top + height,
    center: { x: left + width / 2, y: top + height / 2 },
  };
}
