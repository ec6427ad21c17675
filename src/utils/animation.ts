import { SPOTLIGHT_DEFAULTS, type AnimationPhase, type AnimationValues, type EasingCurve } from '../components/Spotlight/types';

export const linear: EasingCurve = (t) => t;

export const easeInOutCubic: EasingCurve = (t) =>
  t < 0.5 ? 4 * t * t * t : 1 - Math.pow(-2 * t + 2, 3) / 2;

const clampUnit = (value: number) => Math.min(Math.max(value, 0), 1);

export interface AnimationDriverOptions {
  durationMs?: number;
  blurTarget: number;
  opacityTarget: number;
  easing?: EasingCurve;
}

/**
 * Interpolates blur and overlay opacity between 0 and their targets.
 *
 * The driver never reads a clock: callers advance it once per frame with the
 * elapsed time since the previous frame. Switching direction keeps the
 * current progress so a highlight that is deactivated halfway through fading
 * in fades out from where it stopped.
 */
export class AnimationDriver {
  private readonly durationMs: number;
  private readonly blurTarget: number;
  private readonly opacityTarget: number;
  private readonly easing: EasingCurve;
  private _phase: AnimationPhase = 'idle';
  private _progress = 0;
  private disposed = false;

  constructor(options: AnimationDriverOptions) {
    this.durationMs = options.durationMs ?? SPOTLIGHT_DEFAULTS.DURATION_MS;
    this.blurTarget = Math.max(0, options.blurTarget);
    this.opacityTarget = clampUnit(options.opacityTarget);
    this.easing = options.easing ?? linear;
  }

  get phase(): AnimationPhase {
    return this._phase;
  }

  get progress(): number {
    return this._progress;
  }

  get isAnimating(): boolean {
    return this._phase !== 'idle';
  }

  get values(): AnimationValues {
    const eased = clampUnit(this.easing(this._progress));
    return {
      progress: this._progress,
      blur: this.blurTarget * eased,
      opacity: this.opacityTarget * eased,
    };
  }

  forward(): void {
    this.start('forward');
  }

  reverse(): void {
    this.start('reverse');
  }

  advance(deltaMs: number): AnimationValues {
    if (this.disposed || this._phase === 'idle') return this.values;

    const delta = Number.isFinite(deltaMs) ? Math.max(0, deltaMs) : 0;
    const step = this.durationMs <= 0 ? 1 : delta / this.durationMs;

    if (this._phase === 'forward') {
      this._progress = clampUnit(this._progress + step);
      if (this._progress >= 1) this._phase = 'idle';
    } else {
      this._progress = clampUnit(this._progress - step);
      if (this._progress <= 0) this._phase = 'idle';
    }
    return this.values;
  }

  dispose(): void {
    this.disposed = true;
    this._phase = 'idle';
  }

  private start(direction: 'forward' | 'reverse') {
    if (this.disposed || this._phase === direction) return;
    const settled = direction === 'forward' ? this._progress >= 1 : this._progress <= 0;
    this._phase = settled ? 'idle' : direction;
  }
}
