export { Spotlight } from './Spotlight';
export { SpotlightOverlay } from './SpotlightOverlay';
export { SpotlightErrorBoundary } from './SpotlightErrorBoundary';
export { useSpotlight } from './useSpotlight';
export type { UseSpotlightResult } from './useSpotlight';
export { useTargetBounds } from './useTargetBounds';
export { useViewport } from './useViewport';
export * from './types';
