import type { NoiseLayerKind } from '../types';

export interface NoiseLayerConfig {
  kind: NoiseLayerKind;
  enabled: boolean;
  seed: number;
  /** Spatial frequency along x (> 0) */
  scaleX: number;
  /** Spatial frequency along y (> 0) */
  scaleY: number;
  octaves: number;
  /** Per-octave amplitude decay */
  persistence: number;
  /** Per-octave frequency growth */
  lacunarity: number;
  /** Exponent of the ridge transform; unused by warp layers */
  ridgePower: number;
  /** Post-normalization contrast exponent; only the base layer's is applied */
  heightPower: number;
  /** Blend weight, or displacement magnitude for warp layers */
  amplitude: number;
}

const LAYER_DEFAULTS: Omit<NoiseLayerConfig, 'kind'> = {
  enabled: true,
  seed: 0,
  scaleX: 1.5,
  scaleY: 0.3,
  octaves: 5,
  persistence: 0.5,
  lacunarity: 2.0,
  ridgePower: 2.0,
  heightPower: 1.7,
  amplitude: 1.0,
};

export const MIN_OCTAVES = 1;
export const MAX_OCTAVES = 8;

export function createNoiseLayer(
  kind: NoiseLayerKind,
  overrides: Partial<Omit<NoiseLayerConfig, 'kind'>> = {}
): NoiseLayerConfig {
  return { kind, ...LAYER_DEFAULTS, ...overrides };
}

export function isWarpLayer(layer: NoiseLayerConfig): boolean {
  return layer.kind === 'warp';
}

/** Base and detail layers are ridge-shaped and blended into the height signal. */
export function isHeightLayer(layer: NoiseLayerConfig): boolean {
  return layer.kind === 'base' || layer.kind === 'detail';
}
