import {
  SPOTLIGHT_DEFAULTS,
  cornerRadiiAll,
  type CornerRadii,
  type CornerRadius,
  type HoleShape,
  type MaskPath,
  type Rect,
  type ShapeDescriptor,
  type Viewport,
} from '../components/Spotlight/types';

const toRadii = (radius: CornerRadius): CornerRadii =>
  typeof radius === 'number' ? cornerRadiiAll(radius) : { ...radius };

// Three decimals keep the path text stable across platforms.
const fmt = (value: number) => String(Math.round(value * 1000) / 1000);

export function inflateRect(rect: Rect, amount: number): Rect {
  return {
    left: rect.left - amount,
    top: rect.top - amount,
    width: Math.max(0, rect.width + amount * 2),
    height: Math.max(0, rect.height + amount * 2),
  };
}

/**
 * Scales all radii down by the same factor when adjacent corners would
 * overlap along a side.
 */
export function constrainRadii(radii: CornerRadii, width: number, height: number): CornerRadii {
  const clean: CornerRadii = {
    topLeft: Math.max(0, radii.topLeft),
    topRight: Math.max(0, radii.topRight),
    bottomRight: Math.max(0, radii.bottomRight),
    bottomLeft: Math.max(0, radii.bottomLeft),
  };
  const sides: Array<[number, number]> = [
    [width, clean.topLeft + clean.topRight],
    [height, clean.topRight + clean.bottomRight],
    [width, clean.bottomRight + clean.bottomLeft],
    [height, clean.bottomLeft + clean.topLeft],
  ];
  const ratios = sides.map(([side, sum]) => (sum > 0 ? side / sum : Infinity));
  const factor = Math.min(1, ...ratios);
  if (factor >= 1) return clean;
  return {
    topLeft: clean.topLeft * factor,
    topRight: clean.topRight * factor,
    bottomRight: clean.bottomRight * factor,
    bottomLeft: clean.bottomLeft * factor,
  };
}

/** An explicit corner radius beats whatever the shape asks for, circle included. */
export function resolveHoleShape(
  rect: Rect,
  shape: ShapeDescriptor,
  cornerOverride?: CornerRadius
): HoleShape {
  if (cornerOverride === undefined && shape.kind === 'circle') {
    return {
      kind: 'circle',
      cx: rect.left + rect.width / 2,
      cy: rect.top + rect.height / 2,
      r: Math.hypot(rect.width, rect.height) / 2,
    };
  }

  const shapeRadius = shape.kind === 'roundedRect' ? shape.radius : undefined;
  const radius = cornerOverride ?? shapeRadius ?? SPOTLIGHT_DEFAULTS.CORNER_RADIUS;
  return {
    kind: 'roundedRect',
    rect,
    radii: constrainRadii(toRadii(radius), rect.width, rect.height),
  };
}

function arc(radius: number, x: number, y: number): string {
  return radius > 0 ? `A${fmt(radius)} ${fmt(radius)} 0 0 1 ${fmt(x)} ${fmt(y)}` : `L${fmt(x)} ${fmt(y)}`;
}

export function rectPathData(rect: Rect): string {
  const right = rect.left + rect.width;
  const bottom = rect.top + rect.height;
  return `M${fmt(rect.left)} ${fmt(rect.top)}H${fmt(right)}V${fmt(bottom)}H${fmt(rect.left)}Z`;
}

export function holePathData(hole: HoleShape): string {
  if (hole.kind === 'circle') {
    const { cx, cy, r } = hole;
    return (
      `M${fmt(cx - r)} ${fmt(cy)}` +
      `A${fmt(r)} ${fmt(r)} 0 1 0 ${fmt(cx + r)} ${fmt(cy)}` +
      `A${fmt(r)} ${fmt(r)} 0 1 0 ${fmt(cx - r)} ${fmt(cy)}Z`
    );
  }

  const { rect, radii } = hole;
  const left = rect.left;
  const top = rect.top;
  const right = rect.left + rect.width;
  const bottom = rect.top + rect.height;
  return [
    `M${fmt(left + radii.topLeft)} ${fmt(top)}`,
    `H${fmt(right - radii.topRight)}`,
    arc(radii.topRight, right, top + radii.topRight),
    `V${fmt(bottom - radii.bottomRight)}`,
    arc(radii.bottomRight, right - radii.bottomRight, bottom),
    `H${fmt(left + radii.bottomLeft)}`,
    arc(radii.bottomLeft, left, bottom - radii.bottomLeft),
    `V${fmt(top + radii.topLeft)}`,
    arc(radii.topLeft, left + radii.topLeft, top),
    'Z',
  ].join('');
}

/**
 * Builds the backdrop path: the whole viewport with the target's shape cut
 * out. Fill it with the even-odd rule to paint everything but the hole.
 */
export function buildMask(
  rect: Rect,
  shape: ShapeDescriptor,
  visualPadding: number,
  viewport: Viewport,
  cornerOverride?: CornerRadius
): MaskPath {
  const outer: Rect = {
    left: 0,
    top: 0,
    width: Math.max(0, viewport.width),
    height: Math.max(0, viewport.height),
  };
  const hole = resolveHoleShape(inflateRect(rect, visualPadding), shape, cornerOverride);

  return {
    fillRule: 'evenodd',
    outer,
    hole,
    d: rectPathData(outer) + holePathData(hole),
  };
}
