import { useCallback, useEffect, useState, type RefObject } from 'react';
import type { TargetBounds } from './types';

const sameBounds = (a: TargetBounds, b: TargetBounds) =>
  a.top === b.top && a.left === b.left && a.width === b.width && a.height === b.height;

/**
 * Tracks getBoundingClientRect() of the referenced element.
 * Re-measures on scroll (capture phase on window + scrollable ancestors),
 * resize, and ResizeObserver on the element. Null until the element mounts.
 */
export function useTargetBounds(ref: RefObject<Element | null>): TargetBounds | null {
  const [bounds, setBounds] = useState<TargetBounds | null>(null);

  const measure = useCallback(() => {
    const el = ref.current;
    if (!el) {
      setBounds(null);
      return;
    }
    const r = el.getBoundingClientRect();
    const next: TargetBounds = { left: r.left, top: r.top, width: r.width, height: r.height };
    setBounds((prev) => (prev && sameBounds(prev, next) ? prev : next));
  }, [ref]);

  useEffect(() => {
    const el = ref.current;
    measure();
    if (!el) return;

    const cleanups: (() => void)[] = [];

    if (typeof ResizeObserver !== 'undefined') {
      const observer = new ResizeObserver(() => measure());
      observer.observe(el);
      cleanups.push(() => observer.disconnect());
    }

    // Walk up to find scrollable ancestors
    let parent = el.parentElement;
    while (parent) {
      const style = getComputedStyle(parent);
      const overflow = style.overflow + style.overflowX + style.overflowY;
      if (/auto|scroll/.test(overflow)) {
        const target = parent;
        target.addEventListener('scroll', measure, { passive: true });
        cleanups.push(() => target.removeEventListener('scroll', measure));
      }
      parent = parent.parentElement;
    }

    window.addEventListener('scroll', measure, { capture: true, passive: true });
    window.addEventListener('resize', measure);
    cleanups.push(() => {
      window.removeEventListener('scroll', measure, { capture: true });
      window.removeEventListener('resize', measure);
    });

    return () => cleanups.forEach((cleanup) => cleanup());
  }, [ref, measure]);

  return bounds;
}
