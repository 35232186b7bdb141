import type { NoiseLayerConfig } from '../core/noise-layer';
import { isHeightLayer } from '../core/noise-layer';
import { NoiseBank } from './simplex';

/**
 * Ridge transform: turns zero crossings of the noise into sharp crests.
 */
export function ridge(raw: number, power: number): number {
  const r = 1 - Math.abs(raw);
  return power === 1 ? r : Math.pow(r, power);
}

/**
 * Sum `octaves` noise samples at growing frequency and shrinking amplitude.
 *
 * Base and detail layers are ridge-shaped per octave; warp layers sum the
 * raw samples (plain FBM). The sum is not divided by the total amplitude,
 * callers normalize. Disabled layers return 0 without touching the noise.
 */
export function evaluateLayer(
  layer: NoiseLayerConfig,
  x: number,
  y: number,
  bank: NoiseBank = new NoiseBank()
): number {
  if (!layer.enabled) return 0;

  const ridged = isHeightLayer(layer);
  let frequency = 1;
  let amplitude = 1;
  let total = 0;

  for (let i = 0; i < layer.octaves; i++) {
    const raw = bank.sample(
      x * layer.scaleX * frequency,
      y * layer.scaleY * frequency,
      layer.seed
    );
    total += (ridged ? ridge(raw, layer.ridgePower) : raw) * amplitude;
    amplitude *= layer.persistence;
    frequency *= layer.lacunarity;
  }

  return total;
}
