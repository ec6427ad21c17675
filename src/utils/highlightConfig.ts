import { ConfigurationError } from '../services/errors';
import { linear } from './animation';
import {
  EDGE_INSETS_ZERO,
  SPOTLIGHT_DEFAULTS,
  type CornerRadius,
  type EdgeInsets,
  type HighlightConfig,
  type ResolvedHighlightConfig,
  type ShapeDescriptor,
} from '../components/Spotlight/types';

const isNonNegative = (value: number) => Number.isFinite(value) && value >= 0;

function assertNonNegative(field: string, value: number) {
  if (!isNonNegative(value)) {
    throw new ConfigurationError(field, value, 'must be a finite number >= 0');
  }
}

function validatePadding(field: string, padding: EdgeInsets) {
  assertNonNegative(`${field}.left`, padding.left);
  assertNonNegative(`${field}.top`, padding.top);
  assertNonNegative(`${field}.right`, padding.right);
  assertNonNegative(`${field}.bottom`, padding.bottom);
}

function validateRadius(field: string, radius: CornerRadius) {
  if (typeof radius === 'number') {
    assertNonNegative(field, radius);
    return;
  }
  assertNonNegative(`${field}.topLeft`, radius.topLeft);
  assertNonNegative(`${field}.topRight`, radius.topRight);
  assertNonNegative(`${field}.bottomRight`, radius.bottomRight);
  assertNonNegative(`${field}.bottomLeft`, radius.bottomLeft);
}

/**
 * Merges a partial highlight configuration with the defaults and rejects
 * values that could never render, so a bad config fails at construction
 * rather than on a frame.
 */
export function createHighlightConfig(config: HighlightConfig = {}): ResolvedHighlightConfig {
  const overlayOpacity = config.overlayOpacity ?? SPOTLIGHT_DEFAULTS.OVERLAY_OPACITY;
  if (!Number.isFinite(overlayOpacity) || overlayOpacity < 0 || overlayOpacity > 1) {
    throw new ConfigurationError('overlayOpacity', overlayOpacity, 'must be between 0 and 1');
  }

  const blurStrength = config.blurStrength ?? SPOTLIGHT_DEFAULTS.BLUR_STRENGTH;
  assertNonNegative('blurStrength', blurStrength);

  const visualPadding = config.visualPadding ?? SPOTLIGHT_DEFAULTS.VISUAL_PADDING;
  assertNonNegative('visualPadding', visualPadding);

  const durationMs = config.durationMs ?? SPOTLIGHT_DEFAULTS.DURATION_MS;
  if (!Number.isFinite(durationMs)) {
    throw new ConfigurationError('durationMs', durationMs, 'must be a finite number');
  }

  const padding = config.padding ?? EDGE_INSETS_ZERO;
  validatePadding('padding', padding);

  const shape: ShapeDescriptor = config.shape ?? { kind: 'roundedRect' };
  if (shape.kind === 'roundedRect' && shape.radius !== undefined) {
    validateRadius('shape.radius', shape.radius);
  }
  if (config.cornerRadius !== undefined) {
    validateRadius('cornerRadius', config.cornerRadius);
  }

  const overlayColor = config.overlayColor ?? SPOTLIGHT_DEFAULTS.OVERLAY_COLOR;
  if (overlayColor.trim() === '') {
    throw new ConfigurationError('overlayColor', overlayColor, 'must not be empty');
  }

  return {
    shape,
    cornerRadius: config.cornerRadius,
    padding,
    overlayColor,
    overlayOpacity,
    blurStrength,
    visualPadding,
    durationMs,
    clampToViewport: config.clampToViewport ?? false,
    easing: config.easing ?? linear,
    onDismiss: config.onDismiss,
  };
}
