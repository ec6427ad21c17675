import { useEffect } from 'react';
import { selectViewport, useSpotlightStore } from '../../stores/spotlightStore';
import type { Viewport } from './types';

/** Window inner size, mirrored into the spotlight store on every resize. */
export function useViewport(): Viewport {
  const viewport = useSpotlightStore(selectViewport);
  const setViewport = useSpotlightStore((s) => s.setViewport);

  useEffect(() => {
    const onResize = () => setViewport({ width: window.innerWidth, height: window.innerHeight });
    onResize();
    window.addEventListener('resize', onResize);
    return () => window.removeEventListener('resize', onResize);
  }, [setViewport]);

  return viewport;
}
