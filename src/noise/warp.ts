import type { NoiseLayerConfig } from '../core/noise-layer';
import { isWarpLayer } from '../core/noise-layer';
import type { Vec2 } from '../types';
import { evaluateLayer } from './fractal';
import { NoiseBank } from './simplex';

/** Shift between the x and y displacement lookups of one warp layer. */
export const WARP_DECORRELATION_OFFSET = 1000;

/**
 * Displace (x, y) by one warp layer's FBM field.
 */
export function warp(
  x: number,
  y: number,
  layer: NoiseLayerConfig,
  bank: NoiseBank = new NoiseBank()
): Vec2 {
  if (!layer.enabled) return [x, y];

  const wx = evaluateLayer(layer, x, y, bank);
  const wy = evaluateLayer(
    layer,
    x + WARP_DECORRELATION_OFFSET,
    y + WARP_DECORRELATION_OFFSET,
    bank
  );
  return [x + wx * layer.amplitude, y + wy * layer.amplitude];
}

/**
 * Apply every enabled warp layer in order, each one warping the
 * coordinates produced by the previous. Identity when there are none.
 */
export function warpAll(
  x: number,
  y: number,
  layers: readonly NoiseLayerConfig[],
  bank: NoiseBank = new NoiseBank()
): Vec2 {
  let point: Vec2 = [x, y];
  for (const layer of layers) {
    if (!isWarpLayer(layer) || !layer.enabled) continue;
    point = warp(point[0], point[1], layer, bank);
  }
  return point;
}
