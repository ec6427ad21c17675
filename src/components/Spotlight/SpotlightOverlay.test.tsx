/**
 * @vitest-environment jsdom
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { cleanup, fireEvent, render, screen } from '@testing-library/react';
import { SpotlightOverlay } from './SpotlightOverlay';
import { buildDrawPlan } from '../../services/overlayComposer';
import { createHighlightConfig } from '../../utils/highlightConfig';
import { resolveTargetGeometry } from '../../utils/geometry';
import { EDGE_INSETS_ZERO, type HighlightConfig } from './types';

const viewport = { width: 400, height: 800 };

const planFor = (config: HighlightConfig = {}) =>
  buildDrawPlan(
    resolveTargetGeometry({ top: 100, left: 50, width: 40, height: 20 }, EDGE_INSETS_ZERO, viewport),
    createHighlightConfig(config),
    { progress: 1, blur: 6, opacity: 0.5 },
    viewport
  );

describe('SpotlightOverlay', () => {
  afterEach(() => {
    cleanup();
  });

  it('fills the backdrop path with the overlay color at the plan alpha', () => {
    const plan = planFor({ overlayColor: '#112233' });
    render(<SpotlightOverlay plan={plan} onBackdropClick={() => {}} />);

    const path = screen.getByTestId('spotlight-backdrop-path');
    expect(path.getAttribute('d')).toBe(plan.backdropPath.d);
    expect(path.getAttribute('fill')).toBe('#112233');
    expect(path.getAttribute('fill-opacity')).toBe('0.5');
    expect(path.getAttribute('fill-rule')).toBe('evenodd');
  });

  it('places the highlight border over the padded hole', () => {
    render(<SpotlightOverlay plan={planFor()} onBackdropClick={() => {}} />);

    const highlight = screen.getByTestId('spotlight-highlight');
    expect(highlight.style.left).toBe('42px');
    expect(highlight.style.top).toBe('92px');
    expect(highlight.style.width).toBe('56px');
    expect(highlight.style.height).toBe('36px');
  });

  it('draws a solid border around the highlight', () => {
    const { rerender } = render(<SpotlightOverlay plan={planFor()} onBackdropClick={() => {}} />);

    const highlight = () => screen.getByTestId('spotlight-highlight');
    expect(highlight().style.borderStyle).toBe('solid');
    expect(highlight().style.borderWidth).toBe('2px');

    rerender(<SpotlightOverlay plan={planFor()} onBackdropClick={() => {}} highlightBorderWidth={4} />);
    expect(highlight().style.borderWidth).toBe('4px');
  });

  it('lets taps through the backdrop when not interactive', () => {
    render(<SpotlightOverlay plan={planFor()} onBackdropClick={() => {}} interactive={false} />);

    expect(screen.getByTestId('spotlight-backdrop').style.pointerEvents).toBe('none');
  });

  it('reports backdrop clicks', () => {
    const onBackdropClick = vi.fn();
    render(<SpotlightOverlay plan={planFor()} onBackdropClick={onBackdropClick} />);

    fireEvent.click(screen.getByTestId('spotlight-backdrop'));
    expect(onBackdropClick).toHaveBeenCalledTimes(1);
  });
});
