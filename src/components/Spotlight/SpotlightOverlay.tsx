import type { CSSProperties } from 'react';
import { SPOTLIGHT_DEFAULTS, SPOTLIGHT_Z, type DrawPlan, type HoleShape } from './types';

interface SpotlightOverlayProps {
  plan: DrawPlan;
  onBackdropClick: () => void;
  /** False while fading out: the backdrop stops taking taps. */
  interactive?: boolean;
  highlightBorderWidth?: number;
  highlightBorderColor?: string;
}

const px = (value: number) => `${value}px`;

const borderRadiusOf = (shape: HoleShape): string => {
  if (shape.kind === 'circle') return '50%';
  const { topLeft, topRight, bottomRight, bottomLeft } = shape.radii;
  return [topLeft, topRight, bottomRight, bottomLeft].map(px).join(' ');
};

export const SpotlightOverlay = ({
  plan,
  onBackdropClick,
  interactive = true,
  highlightBorderWidth = SPOTLIGHT_DEFAULTS.HIGHLIGHT_BORDER_WIDTH,
  highlightBorderColor = SPOTLIGHT_DEFAULTS.HIGHLIGHT_BORDER_COLOR,
}: SpotlightOverlayProps) => {
  const { backdropPath, highlightRect } = plan;

  // The clip path also limits hit testing, so taps inside the hole reach the target.
  const backdropStyle: CSSProperties = {
    position: 'absolute',
    inset: 0,
    pointerEvents: interactive ? 'auto' : 'none',
    clipPath: `path(evenodd, '${backdropPath.d}')`,
    backdropFilter: plan.blurRadius > 0 ? `blur(${plan.blurRadius}px)` : undefined,
  };

  return (
    <div
      data-testid="spotlight-overlay"
      style={{ position: 'fixed', inset: 0, pointerEvents: 'none', zIndex: SPOTLIGHT_Z.OVERLAY }}
    >
      <div data-testid="spotlight-backdrop" style={backdropStyle} onClick={onBackdropClick} />
      <svg
        width={backdropPath.outer.width}
        height={backdropPath.outer.height}
        style={{ position: 'absolute', left: 0, top: 0 }}
      >
        <path
          data-testid="spotlight-backdrop-path"
          d={backdropPath.d}
          fill={plan.overlayColor}
          fillOpacity={plan.overlayAlpha}
          fillRule={backdropPath.fillRule}
        />
      </svg>
      <div
        data-testid="spotlight-highlight"
        style={{
          position: 'absolute',
          left: px(highlightRect.left),
          top: px(highlightRect.top),
          width: px(highlightRect.width),
          height: px(highlightRect.height),
          boxSizing: 'border-box',
          borderWidth: px(highlightBorderWidth),
          borderStyle: 'solid',
          borderColor: highlightBorderColor,
          borderRadius: borderRadiusOf(plan.highlightShape),
          pointerEvents: 'none',
          zIndex: SPOTLIGHT_Z.HIGHLIGHT,
        }}
      />
    </div>
  );
};
