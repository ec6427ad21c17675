export * from './components/Spotlight';
export { OverlayComposer, buildDrawPlan } from './services/overlayComposer';
export type { ComposerMessage, OverlayComposerOptions } from './services/overlayComposer';
export { SpotlightError, ConfigurationError, NotReadyError } from './services/errors';
export type { SpotlightErrorCode } from './services/errors';
export { createConsoleLogger } from './services/logger';
export type { SpotlightLogger } from './services/logger';
export { useSpotlightStore, selectActiveKey, selectEnabled, selectViewport } from './stores/spotlightStore';
export type { SpotlightStore } from './stores/spotlightStore';
export { resolveTargetGeometry } from './utils/geometry';
export type { ResolveOptions } from './utils/geometry';
export { buildMask, resolveHoleShape, constrainRadii, inflateRect } from './utils/shapeMask';
export { AnimationDriver, linear, easeInOutCubic } from './utils/animation';
export type { AnimationDriverOptions } from './utils/animation';
export { createHighlightConfig } from './utils/highlightConfig';
