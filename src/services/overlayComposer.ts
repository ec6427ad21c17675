import { AnimationDriver } from '../utils/animation';
import { resolveTargetGeometry } from '../utils/geometry';
import { createHighlightConfig } from '../utils/highlightConfig';
import { buildMask } from '../utils/shapeMask';
import { NotReadyError } from './errors';
import { createConsoleLogger, type SpotlightLogger } from './logger';
import type {
  AnimationValues,
  ComposeResult,
  DrawPlan,
  HiddenReason,
  HighlightConfig,
  ResolvedHighlightConfig,
  TargetBounds,
  TargetGeometry,
  Viewport,
} from '../components/Spotlight/types';

export type ComposerMessage =
  | { type: 'activate'; activeKey: string | null }
  | { type: 'geometry'; targetBounds: TargetBounds | null; viewport: Viewport }
  | { type: 'tick'; deltaMs: number }
  | { type: 'dismiss' }
  | { type: 'teardown' };

export interface OverlayComposerOptions {
  logger?: SpotlightLogger;
  /** When false the overlay is never shown, whatever the active key. */
  enabled?: boolean;
}

/** Assembles a draw plan from resolved geometry and the current animation values. */
export function buildDrawPlan(
  geometry: TargetGeometry,
  config: ResolvedHighlightConfig,
  values: AnimationValues,
  viewport: Viewport
): DrawPlan {
  const backdropPath = buildMask(geometry, config.shape, config.visualPadding, viewport, config.cornerRadius);
  const highlightRect =
    backdropPath.hole.kind === 'roundedRect'
      ? backdropPath.hole.rect
      : {
          left: backdropPath.hole.cx - backdropPath.hole.r,
          top: backdropPath.hole.cy - backdropPath.hole.r,
          width: backdropPath.hole.r * 2,
          height: backdropPath.hole.r * 2,
        };

  return {
    backdropPath,
    blurRadius: values.blur,
    overlayColor: config.overlayColor,
    overlayAlpha: values.opacity,
    highlightRect,
    highlightShape: backdropPath.hole,
  };
}

/**
 * Owns the geometry and animation state of one highlight. A sequencer drives
 * it with messages (activation, geometry, frame ticks, dismiss, teardown) and
 * renders whatever {@link ComposeResult} comes back.
 */
export class OverlayComposer {
  readonly key: string;
  readonly config: ResolvedHighlightConfig;
  private readonly driver: AnimationDriver;
  private readonly logger: SpotlightLogger;
  private enabled: boolean;
  private tornDown = false;
  private activeKey: string | null = null;
  private targetBounds: TargetBounds | null = null;
  private viewport: Viewport = { width: 0, height: 0 };

  constructor(key: string, config: HighlightConfig = {}, options: OverlayComposerOptions = {}) {
    this.key = key;
    this.config = createHighlightConfig(config);
    this.logger = options.logger ?? createConsoleLogger(key);
    this.enabled = options.enabled ?? true;
    this.driver = new AnimationDriver({
      durationMs: this.config.durationMs,
      blurTarget: this.config.blurStrength,
      opacityTarget: this.config.overlayOpacity,
      easing: this.config.easing,
    });
  }

  get isAnimating(): boolean {
    return this.driver.isAnimating;
  }

  compose(activeKey: string | null, targetBounds: TargetBounds | null, viewport: Viewport): ComposeResult {
    if (this.tornDown) return this.hidden('torn-down');

    if (!this.enabled || activeKey !== this.key) {
      this.driver.reverse();
      return this.hidden(this.enabled ? 'inactive' : 'disabled');
    }

    let geometry: TargetGeometry;
    try {
      geometry = resolveTargetGeometry(targetBounds, this.config.padding, viewport, {
        clampToViewport: this.config.clampToViewport,
      });
    } catch (error) {
      if (error instanceof NotReadyError) {
        this.logger.debug('Target not measured yet, waiting for layout');
        return this.hidden('not-ready');
      }
      throw error;
    }

    this.driver.forward();
    return {
      visible: true,
      drawPlan: buildDrawPlan(geometry, this.config, this.driver.values, viewport),
      values: this.driver.values,
    };
  }

  onActivate(activeKey: string | null): ComposeResult {
    if (activeKey !== this.activeKey) {
      this.logger.debug(activeKey === this.key ? 'Activated' : 'Deactivated', { activeKey });
    }
    this.activeKey = activeKey;
    return this.current();
  }

  onGeometryChanged(targetBounds: TargetBounds | null, viewport: Viewport): ComposeResult {
    this.targetBounds = targetBounds;
    this.viewport = viewport;
    return this.current();
  }

  setEnabled(enabled: boolean): ComposeResult {
    this.enabled = enabled;
    return this.current();
  }

  tick(deltaMs: number): ComposeResult {
    this.driver.advance(deltaMs);
    return this.current();
  }

  /** Forwards a backdrop tap. Visibility is left to whoever owns the active key. */
  dismiss(): ComposeResult {
    if (!this.tornDown) {
      this.config.onDismiss?.();
    }
    return this.current();
  }

  onTeardown(): ComposeResult {
    this.driver.dispose();
    this.tornDown = true;
    return this.hidden('torn-down');
  }

  dispatch(message: ComposerMessage): ComposeResult {
    switch (message.type) {
      case 'activate':
        return this.onActivate(message.activeKey);
      case 'geometry':
        return this.onGeometryChanged(message.targetBounds, message.viewport);
      case 'tick':
        return this.tick(message.deltaMs);
      case 'dismiss':
        return this.dismiss();
      case 'teardown':
        return this.onTeardown();
    }
  }

  private current(): ComposeResult {
    return this.compose(this.activeKey, this.targetBounds, this.viewport);
  }

  private hidden(reason: HiddenReason): ComposeResult {
    return { visible: false, values: this.driver.values, reason };
  }
}
