import { createDefaultGradient } from './gradient-model';
import type { GradientConfig } from './gradient-model';
import { DEFAULT_LIGHTING } from './lighting-config';
import type { LightingConfig } from './lighting-config';
import { createNoiseLayer } from './noise-layer';
import type { NoiseLayerConfig } from './noise-layer';
import { FROST_PALETTE } from './palette';
import type { Palette } from './palette';

export interface ProjectConfig {
  palette: Palette;
  gradient: GradientConfig;
  /** Evaluated in order; warp layers chain in this order */
  noiseLayers: NoiseLayerConfig[];
  lighting: LightingConfig;
  previewWidth: number;
  previewHeight: number;
  noisePreviewWidth: number;
  noisePreviewHeight: number;
  /** Base for per-layer seeds at construction time; the renderer ignores it */
  seedGlobal: number;
}

export const DEFAULT_SEED_GLOBAL = 42;

/**
 * Assign `seedGlobal + index` to every layer.
 */
export function deriveLayerSeeds(
  layers: NoiseLayerConfig[],
  seedGlobal: number
): NoiseLayerConfig[] {
  return layers.map((layer, index) => ({ ...layer, seed: seedGlobal + index }));
}

/**
 * The "frost" dune project: one warp, one base and one detail layer.
 */
export function createDefaultProject(seedGlobal = DEFAULT_SEED_GLOBAL): ProjectConfig {
  const layers = [
    createNoiseLayer('warp', {
      scaleX: 0.2,
      scaleY: 0.05,
      octaves: 2,
      ridgePower: 1.0,
      heightPower: 1.0,
      amplitude: 0.5,
    }),
    createNoiseLayer('base', {
      scaleX: 1.5,
      scaleY: 0.3,
      octaves: 5,
      ridgePower: 2.0,
      heightPower: 1.7,
      amplitude: 1.0,
    }),
    createNoiseLayer('detail', {
      scaleX: 6.0,
      scaleY: 2.0,
      octaves: 3,
      ridgePower: 2.0,
      heightPower: 1.3,
      amplitude: 0.4,
    }),
  ];

  return {
    palette: { name: FROST_PALETTE.name, colors: [...FROST_PALETTE.colors] },
    gradient: createDefaultGradient(),
    noiseLayers: deriveLayerSeeds(layers, seedGlobal),
    lighting: { ...DEFAULT_LIGHTING },
    previewWidth: 960,
    previewHeight: 540,
    noisePreviewWidth: 480,
    noisePreviewHeight: 270,
    seedGlobal,
  };
}

/**
 * Deep copy handed to a render so later edits cannot reach it.
 */
export function snapshotProject(config: ProjectConfig): ProjectConfig {
  return structuredClone(config);
}
