import { describe, it, expect } from 'vitest';
import { AnimationDriver, easeInOutCubic, linear } from './animation';

const createDriver = (overrides: Partial<ConstructorParameters<typeof AnimationDriver>[0]> = {}) =>
  new AnimationDriver({ durationMs: 150, blurTarget: 10, opacityTarget: 0.75, ...overrides });

describe('AnimationDriver', () => {
  it('starts idle at zero', () => {
    const driver = createDriver();
    expect(driver.phase).toBe('idle');
    expect(driver.values).toEqual({ progress: 0, blur: 0, opacity: 0 });
  });

  it('ignores ticks while idle', () => {
    const driver = createDriver();
    expect(driver.advance(100)).toEqual({ progress: 0, blur: 0, opacity: 0 });
    expect(driver.phase).toBe('idle');
  });

  it('reports zero progress at elapsed 0 and settles at the targets after the full duration', () => {
    const driver = createDriver();
    driver.forward();

    expect(driver.advance(0).progress).toBe(0);
    expect(driver.phase).toBe('forward');

    const values = driver.advance(150);
    expect(values).toEqual({ progress: 1, blur: 10, opacity: 0.75 });
    expect(driver.phase).toBe('idle');
  });

  it('interpolates both values linearly by default', () => {
    const driver = createDriver();
    driver.forward();
    expect(driver.advance(75)).toEqual({ progress: 0.5, blur: 5, opacity: 0.375 });
  });

  it('clamps overshooting ticks to the end value', () => {
    const driver = createDriver();
    driver.forward();
    expect(driver.advance(10_000).opacity).toBe(0.75);
  });

  it('is monotonic in both directions', () => {
    const driver = createDriver();
    driver.forward();
    let previous = driver.progress;
    for (let i = 0; i < 20; i++) {
      const { progress } = driver.advance(10);
      expect(progress).toBeGreaterThanOrEqual(previous);
      previous = progress;
    }
    expect(previous).toBe(1);

    driver.reverse();
    for (let i = 0; i < 20; i++) {
      const { progress } = driver.advance(10);
      expect(progress).toBeLessThanOrEqual(previous);
      previous = progress;
    }
    expect(previous).toBe(0);
    expect(driver.phase).toBe('idle');
  });

  it('reverses from the current progress instead of snapping', () => {
    const driver = createDriver();
    driver.forward();
    driver.advance(60);
    expect(driver.progress).toBeCloseTo(0.4);

    driver.reverse();
    expect(driver.phase).toBe('reverse');
    expect(driver.progress).toBeCloseTo(0.4);

    driver.advance(30);
    expect(driver.progress).toBeCloseTo(0.2);
  });

  it('stays idle when asked to move toward the end it already sits at', () => {
    const driver = createDriver();
    driver.reverse();
    expect(driver.phase).toBe('idle');

    driver.forward();
    driver.advance(150);
    driver.forward();
    expect(driver.phase).toBe('idle');
  });

  it('jumps to the end when the duration is not positive', () => {
    const driver = createDriver({ durationMs: 0 });
    driver.forward();
    expect(driver.advance(0)).toEqual({ progress: 1, blur: 10, opacity: 0.75 });

    driver.reverse();
    expect(driver.advance(0).progress).toBe(0);
  });

  it('treats negative and non-finite deltas as no elapsed time', () => {
    const driver = createDriver();
    driver.forward();
    driver.advance(-50);
    driver.advance(NaN);
    expect(driver.progress).toBe(0);
    expect(driver.phase).toBe('forward');
  });

  it('applies the easing curve to both values', () => {
    const driver = createDriver({ durationMs: 100, opacityTarget: 1, blurTarget: 4, easing: easeInOutCubic });
    driver.forward();
    expect(driver.advance(25)).toEqual({ progress: 0.25, blur: 0.25, opacity: 0.0625 });
  });

  it('does nothing after dispose', () => {
    const driver = createDriver({ easing: linear });
    driver.forward();
    driver.advance(75);
    driver.dispose();

    driver.forward();
    expect(driver.phase).toBe('idle');
    expect(driver.advance(75).progress).toBe(0.5);
  });
});
