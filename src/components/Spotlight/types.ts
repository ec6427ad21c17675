export interface Viewport {
  width: number;
  height: number;
}

export interface Rect {
  left: number;
  top: number;
  width: number;
  height: number;
}

/** Position and size of the element to highlight, as reported by the host layout. */
export type TargetBounds = Rect;

export interface EdgeInsets {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

export interface Point {
  x: number;
  y: number;
}

export interface TargetGeometry extends Rect {
  right: number;
  bottom: number;
  center: Point;
}

export interface CornerRadii {
  topLeft: number;
  topRight: number;
  bottomRight: number;
  bottomLeft: number;
}

export type CornerRadius = number | CornerRadii;

export type ShapeDescriptor =
  | { kind: 'roundedRect'; radius?: CornerRadius }
  | { kind: 'circle' };

export type HoleShape =
  | { kind: 'roundedRect'; rect: Rect; radii: CornerRadii }
  | { kind: 'circle'; cx: number; cy: number; r: number };

export interface MaskPath {
  fillRule: 'evenodd';
  outer: Rect;
  hole: HoleShape;
  /** SVG path data: the viewport rectangle followed by the hole. */
  d: string;
}

export type AnimationPhase = 'idle' | 'forward' | 'reverse';

export interface AnimationValues {
  progress: number;
  blur: number;
  opacity: number;
}

export type EasingCurve = (t: number) => number;

export interface DrawPlan {
  backdropPath: MaskPath;
  blurRadius: number;
  overlayColor: string;
  overlayAlpha: number;
  highlightRect: Rect;
  highlightShape: HoleShape;
}

export type HiddenReason = 'inactive' | 'not-ready' | 'disabled' | 'torn-down';

export interface ComposeResult {
  visible: boolean;
  drawPlan?: DrawPlan;
  values: AnimationValues;
  reason?: HiddenReason;
}

export interface HighlightConfig {
  shape?: ShapeDescriptor;
  /** Takes precedence over the shape's own radius. */
  cornerRadius?: CornerRadius;
  padding?: EdgeInsets;
  overlayColor?: string;
  /** Must be within [0, 1]. */
  overlayOpacity?: number;
  blurStrength?: number;
  visualPadding?: number;
  durationMs?: number;
  clampToViewport?: boolean;
  easing?: EasingCurve;
  onDismiss?: () => void;
}

export interface ResolvedHighlightConfig {
  shape: ShapeDescriptor;
  cornerRadius?: CornerRadius;
  padding: EdgeInsets;
  overlayColor: string;
  overlayOpacity: number;
  blurStrength: number;
  visualPadding: number;
  durationMs: number;
  clampToViewport: boolean;
  easing: EasingCurve;
  onDismiss?: () => void;
}

export const EDGE_INSETS_ZERO: EdgeInsets = Object.freeze({ left: 0, top: 0, right: 0, bottom: 0 });

export const edgeInsetsAll = (value: number): EdgeInsets => ({
  left: value,
  top: value,
  right: value,
  bottom: value,
});

export const cornerRadiiAll = (value: number): CornerRadii => ({
  topLeft: value,
  topRight: value,
  bottomRight: value,
  bottomLeft: value,
});

export const SPOTLIGHT_DEFAULTS = {
  DURATION_MS: 150,
  VISUAL_PADDING: 8,
  CORNER_RADIUS: 8,
  OVERLAY_COLOR: '#000000',
  OVERLAY_OPACITY: 0.75,
  BLUR_STRENGTH: 0,
  HIGHLIGHT_BORDER_WIDTH: 2,
  HIGHLIGHT_BORDER_COLOR: 'rgba(255, 255, 255, 0.9)',
} as const;

export const SPOTLIGHT_Z = {
  OVERLAY: 60,
  HIGHLIGHT: 61,
} as const;
