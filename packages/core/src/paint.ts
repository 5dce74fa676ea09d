export interface Rgba32 {
  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly a: number;
}

export type PaintOverride =
  | { readonly kind: 'none' }
  | { readonly kind: 'rgba'; readonly color: Rgba32 };

export type PaintBytes = readonly [number, number, number, number];

export const NO_PAINT: PaintOverride = Object.freeze({ kind: 'none' });

export const NO_PAINT_BYTES: PaintBytes = Object.freeze([0, 0, 0, 0] as const);

/**
 * Normalizes a live paint color. Clear and fully transparent colors carry no
 * paint, whatever their RGB channels say.
 */
export function paintFromLiveColor(color: Rgba32 | undefined): PaintOverride {
  if (color === undefined || color.a === 0) {
    return NO_PAINT;
  }
  return Object.freeze({
    kind: 'rgba',
    color: Object.freeze({ r: color.r, g: color.g, b: color.b, a: color.a }),
  });
}

export function encodePaintBytes(paint: PaintOverride): PaintBytes {
  if (paint.kind === 'none') {
    return NO_PAINT_BYTES;
  }
  const { r, g, b, a } = paint.color;
  return [r, g, b, a];
}

/**
 * Only the all-zero sentinel decodes to "no paint"; any other byte pattern is
 * an explicit color.
 */
export function decodePaintBytes(bytes: PaintBytes): PaintOverride {
  const [r, g, b, a] = bytes;
  if (r === 0 && g === 0 && b === 0 && a === 0) {
    return NO_PAINT;
  }
  return Object.freeze({
    kind: 'rgba',
    color: Object.freeze({ r, g, b, a }),
  });
}

export function paintOverrideColor(paint: PaintOverride): Rgba32 | undefined {
  return paint.kind === 'rgba' ? paint.color : undefined;
}
