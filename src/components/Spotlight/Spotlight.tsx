import { useRef, type ReactNode } from 'react';
import { createPortal } from 'react-dom';
import { SpotlightErrorBoundary } from './SpotlightErrorBoundary';
import { SpotlightOverlay } from './SpotlightOverlay';
import { useSpotlight } from './useSpotlight';
import type { HighlightConfig } from './types';

interface SpotlightProps {
  /** Unique across the page; compared against the store's active key. */
  spotlightKey: string;
  children: ReactNode;
  config?: HighlightConfig;
  highlightBorderWidth?: number;
  highlightBorderColor?: string;
}

export const Spotlight = ({
  spotlightKey,
  children,
  config,
  highlightBorderWidth,
  highlightBorderColor,
}: SpotlightProps) => {
  const targetRef = useRef<HTMLSpanElement>(null);
  const { plan, interactive, dismiss } = useSpotlight(spotlightKey, targetRef, config);

  return (
    <>
      <span ref={targetRef} data-spotlight-key={spotlightKey} style={{ display: 'inline-block' }}>
        {children}
      </span>
      {plan &&
        createPortal(
          <SpotlightErrorBoundary name={spotlightKey}>
            <SpotlightOverlay
              plan={plan}
              onBackdropClick={dismiss}
              interactive={interactive}
              highlightBorderWidth={highlightBorderWidth}
              highlightBorderColor={highlightBorderColor}
            />
          </SpotlightErrorBoundary>,
          document.body,
        )}
    </>
  );
};
