import type { NoiseLayerConfig } from '../core/noise-layer';
import { isHeightLayer, isWarpLayer } from '../core/noise-layer';
import type { ProjectConfig } from '../core/project-config';
import { evaluateLayer } from '../noise/fractal';
import { NoiseBank } from '../noise/simplex';
import { warpAll } from '../noise/warp';
import type { Vec2 } from '../types';

/** Row-major scalar field, `data[y * width + x]`. */
export interface Heightmap {
  width: number;
  height: number;
  data: Float32Array;
}

/** Separately normalized per-role maps for diagnostic previews. */
export interface LayerMaps {
  base: Heightmap;
  detail: Heightmap;
  combined: Heightmap;
}

/**
 * Unnormalized sums accumulated row by row. `base` and `detail` are only
 * allocated when layer maps were requested.
 */
export interface RawHeightFields {
  width: number;
  height: number;
  combined: Float64Array;
  base: Float64Array | null;
  detail: Float64Array | null;
}

// Below this range a field counts as flat.
const FLAT_EPSILON = 1e-8;

/**
 * Normalized sampling domain. Independent of resolution, so a larger
 * render only samples the same pattern more densely.
 */
export function pixelToDomain(px: number, py: number, width: number, height: number): Vec2 {
  return [px / width, py / height];
}

export function createRawFields(width: number, height: number, withLayerMaps: boolean): RawHeightFields {
  const count = width * height;
  return {
    width,
    height,
    combined: new Float64Array(count),
    base: withLayerMaps ? new Float64Array(count) : null,
    detail: withLayerMaps ? new Float64Array(count) : null,
  };
}

/**
 * Evaluate rows [rowStart, rowEnd) into `fields`.
 */
export function sampleHeightRows(
  layers: readonly NoiseLayerConfig[],
  fields: RawHeightFields,
  rowStart: number,
  rowEnd: number,
  bank: NoiseBank
): void {
  const { width, height } = fields;
  const warpLayers = layers.filter((l) => isWarpLayer(l) && l.enabled);
  const heightLayers = layers.filter((l) => isHeightLayer(l) && l.enabled);

  for (let py = rowStart; py < rowEnd; py++) {
    for (let px = 0; px < width; px++) {
      const [x, y] = pixelToDomain(px, py, width, height);
      const [wx, wy] = warpAll(x, y, warpLayers, bank);
      const i = py * width + px;

      let combined = 0;
      for (const layer of heightLayers) {
        const value = evaluateLayer(layer, wx, wy, bank) * layer.amplitude;
        combined += value;
        if (layer.kind === 'base' && fields.base) fields.base[i] += value;
        if (layer.kind === 'detail' && fields.detail) fields.detail[i] += value;
      }
      fields.combined[i] = combined;
    }
  }
}

/**
 * Min-max rescale to [0, 1] over the whole field. A flat field maps to 0.
 */
export function normalizeField(values: ArrayLike<number>): Float32Array {
  const out = new Float32Array(values.length);
  let min = Infinity;
  let max = -Infinity;
  for (let i = 0; i < values.length; i++) {
    const v = values[i];
    if (v < min) min = v;
    if (v > max) max = v;
  }

  const range = max - min;
  if (!(range > FLAT_EPSILON)) return out;

  for (let i = 0; i < values.length; i++) {
    out[i] = (values[i] - min) / range;
  }
  return out;
}

/**
 * Global contrast exponent: the first enabled base layer's heightPower.
 * Detail and warp layers' heightPower have no effect.
 */
export function heightExponent(layers: readonly NoiseLayerConfig[]): number {
  const base = layers.find((l) => l.kind === 'base' && l.enabled);
  return base ? base.heightPower : 1;
}

export function finishHeightmap(fields: RawHeightFields, layers: readonly NoiseLayerConfig[]): Heightmap {
  const data = normalizeField(fields.combined);
  const exponent = heightExponent(layers);
  if (exponent !== 1) {
    for (let i = 0; i < data.length; i++) {
      data[i] = Math.pow(data[i], exponent);
    }
  }
  return { width: fields.width, height: fields.height, data };
}

export function finishLayerMaps(fields: RawHeightFields): LayerMaps | null {
  if (!fields.base || !fields.detail) return null;
  const { width, height } = fields;
  return {
    base: { width, height, data: normalizeField(fields.base) },
    detail: { width, height, data: normalizeField(fields.detail) },
    combined: { width, height, data: normalizeField(fields.combined) },
  };
}

/**
 * Build the shaped heightmap in one go. Assumes a validated config.
 */
export function buildHeightmap(config: ProjectConfig, width: number, height: number): Heightmap {
  const fields = createRawFields(width, height, false);
  sampleHeightRows(config.noiseLayers, fields, 0, height, new NoiseBank());
  return finishHeightmap(fields, config.noiseLayers);
}

export function buildHeightmapWithLayerMaps(
  config: ProjectConfig,
  width: number,
  height: number
): { heightmap: Heightmap; layers: LayerMaps } {
  const fields = createRawFields(width, height, true);
  sampleHeightRows(config.noiseLayers, fields, 0, height, new NoiseBank());
  const layers = finishLayerMaps(fields);
  if (!layers) {
    throw new Error('Layer map fields were not allocated');
  }
  return { heightmap: finishHeightmap(fields, config.noiseLayers), layers };
}
