import { create } from 'zustand';
import { immer } from 'zustand/middleware/immer';
import type { Viewport } from '../components/Spotlight/types';

interface SpotlightState {
  activeKey: string | null;
  enabled: boolean;
  viewport: Viewport;
}

interface SpotlightActions {
  activate: (key: string) => void;
  deactivate: () => void;
  setEnabled: (enabled: boolean) => void;
  setViewport: (viewport: Viewport) => void;
  reset: () => void;
}

export type SpotlightStore = SpotlightState & SpotlightActions;

const readWindowViewport = (): Viewport =>
  typeof window === 'undefined'
    ? { width: 0, height: 0 }
    : { width: window.innerWidth, height: window.innerHeight };

const initialState = (): SpotlightState => ({
  activeKey: null,
  enabled: true,
  viewport: readWindowViewport(),
});

/**
 * Holds which highlight is active. Ordering steps is up to the caller; this
 * store only records the current key.
 */
export const useSpotlightStore = create<SpotlightStore>()(
  immer((set) => ({
    ...initialState(),

    activate: (key) =>
      set((state) => {
        if (!state.enabled) return;
        state.activeKey = key;
      }),

    deactivate: () =>
      set((state) => {
        state.activeKey = null;
      }),

    setEnabled: (enabled) =>
      set((state) => {
        state.enabled = enabled;
        if (!enabled) {
          state.activeKey = null;
        }
      }),

    setViewport: (viewport) =>
      set((state) => {
        if (state.viewport.width === viewport.width && state.viewport.height === viewport.height) return;
        state.viewport = viewport;
      }),

    reset: () =>
      set((state) => {
        Object.assign(state, initialState());
      }),
  }))
);

export const selectActiveKey = (state: SpotlightStore) => state.activeKey;
export const selectEnabled = (state: SpotlightStore) => state.enabled;
export const selectViewport = (state: SpotlightStore) => state.viewport;
