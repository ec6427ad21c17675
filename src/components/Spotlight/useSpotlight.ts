import { useCallback, useEffect, useRef, useState, type RefObject } from 'react';
import { OverlayComposer } from '../../services/overlayComposer';
import { selectActiveKey, selectEnabled, useSpotlightStore } from '../../stores/spotlightStore';
import { useTargetBounds } from './useTargetBounds';
import { useViewport } from './useViewport';
import type { ComposeResult, DrawPlan, HighlightConfig } from './types';

export interface UseSpotlightResult {
  result: ComposeResult | null;
  /**
   * What to draw this frame. While fading out this is the last visible plan
   * with the reversing blur and alpha applied.
   */
  plan: DrawPlan | undefined;
  /** False while fading out, so taps fall through to the page. */
  interactive: boolean;
  dismiss: () => void;
}

/**
 * Binds one highlight to the store's active key, the target element's layout
 * and the display's animation frames. Shape and timing are read once per key;
 * `onDismiss` is always the latest one passed in.
 */
export function useSpotlight(
  key: string,
  targetRef: RefObject<Element | null>,
  config?: HighlightConfig
): UseSpotlightResult {
  const activeKey = useSpotlightStore(selectActiveKey);
  const enabled = useSpotlightStore(selectEnabled);
  const viewport = useViewport();
  const targetBounds = useTargetBounds(targetRef);

  const configRef = useRef(config);
  configRef.current = config;
  const enabledRef = useRef(enabled);
  const composerRef = useRef<OverlayComposer | null>(null);
  const [result, setResult] = useState<ComposeResult | null>(null);
  const [lastPlan, setLastPlan] = useState<DrawPlan | null>(null);
  const [animating, setAnimating] = useState(false);

  const accept = useCallback((next: ComposeResult) => {
    setResult(next);
    const drawPlan = next.drawPlan;
    if (drawPlan) setLastPlan(drawPlan);
  }, []);

  const publish = useCallback(
    (composer: OverlayComposer, next: ComposeResult) => {
      accept(next);
      setAnimating(composer.isAnimating);
    },
    [accept]
  );

  useEffect(() => {
    const composer = new OverlayComposer(
      key,
      { ...configRef.current, onDismiss: () => configRef.current?.onDismiss?.() },
      { enabled: enabledRef.current }
    );
    composerRef.current = composer;
    setResult(null);
    setLastPlan(null);
    return () => {
      composer.onTeardown();
      composerRef.current = null;
    };
  }, [key]);

  useEffect(() => {
    enabledRef.current = enabled;
    const composer = composerRef.current;
    if (!composer) return;
    composer.setEnabled(enabled);
    publish(composer, composer.onActivate(activeKey));
  }, [key, activeKey, enabled, publish]);

  useEffect(() => {
    const composer = composerRef.current;
    if (!composer) return;
    publish(composer, composer.onGeometryChanged(targetBounds, viewport));
  }, [key, targetBounds, viewport, publish]);

  useEffect(() => {
    const composer = composerRef.current;
    if (!animating || !composer) return;

    let frame = 0;
    let stopped = false;
    let last: number | null = null;
    const step = (now: number) => {
      // A frame already handed to the display can still fire after cleanup.
      if (stopped || composerRef.current !== composer) return;
      const delta = last === null ? 0 : now - last;
      last = now;
      const next = composer.tick(delta);
      if (composer.isAnimating) {
        accept(next);
        frame = requestAnimationFrame(step);
      } else {
        publish(composer, next);
      }
    };
    frame = requestAnimationFrame(step);
    return () => {
      stopped = true;
      cancelAnimationFrame(frame);
    };
  }, [key, animating, accept, publish]);

  const dismiss = useCallback(() => {
    composerRef.current?.dismiss();
  }, []);

  let plan: DrawPlan | undefined;
  if (result?.visible) {
    plan = result.drawPlan;
  } else if (result && lastPlan && result.values.progress > 0) {
    plan = { ...lastPlan, overlayAlpha: result.values.opacity, blurRadius: result.values.blur };
  }

  return { result, plan, interactive: result?.visible ?? false, dismiss };
}
