// Dune Render - public entry point

export type { Vec2, Vec3, Rgb, NoiseLayerKind, Orientation, Size, CancelSignal } from './types';

// Config model
export type { ConfigIssue } from './core/errors';
export { ConfigurationError } from './core/errors';
export { hexToRgb, rgbToHex, lerpRgb } from './core/color';
export type { GradientStop, GradientConfig } from './core/gradient-model';
export {
  GradientModel,
  MIN_STOPS,
  MAX_STOPS,
  createDefaultGradient,
  sortStops,
} from './core/gradient-model';
export type { LightingConfig } from './core/lighting-config';
export { DEFAULT_LIGHTING } from './core/lighting-config';
export type { NoiseLayerConfig } from './core/noise-layer';
export { MIN_OCTAVES, MAX_OCTAVES, createNoiseLayer } from './core/noise-layer';
export type { Palette } from './core/palette';
export { FROST_PALETTE } from './core/palette';
export type { ProjectConfig } from './core/project-config';
export {
  DEFAULT_SEED_GLOBAL,
  createDefaultProject,
  deriveLayerSeeds,
  snapshotProject,
} from './core/project-config';
export { collectConfigIssues, validateProjectConfig, validateDimensions } from './core/validation';
export type { SerializedProject } from './core/serialization';
export {
  PROJECT_FORMAT_VERSION,
  serializeProject,
  deserializeProject,
  projectToJson,
  projectFromJson,
  serializePalette,
  deserializePalette,
  serializePalettes,
  deserializePalettes,
} from './core/serialization';

// Noise
export { NoiseBank, createSeededNoise, noise2d } from './noise/simplex';
export { evaluateLayer, ridge } from './noise/fractal';
export { WARP_DECORRELATION_OFFSET, warp, warpAll } from './noise/warp';

// Rendering
export type { Heightmap, LayerMaps } from './rendering/heightmap';
export { buildHeightmap, buildHeightmapWithLayerMaps, normalizeField } from './rendering/heightmap';
export type { NormalField } from './rendering/lighting';
export { AMBIENT_FLOOR, buildLightVector, computeBrightness, computeNormals } from './rendering/lighting';
export type { GradientSample } from './rendering/gradient-mapper';
export { createGradientAxis, gradientColor, gradientT } from './rendering/gradient-mapper';
export type { GrayImage, RgbaImage } from './rendering/image';
export { heightmapToGray, pixelAt } from './rendering/image';
export type {
  LayerPreviews,
  RenderOptions,
  RenderOutcome,
  RenderProgress,
  RenderStage,
} from './rendering/renderer';
export { DEFAULT_BLOCK_ROWS, render, renderLayerPreviews, renderSteps } from './rendering/renderer';

// Jobs and export
export type { RenderJobOptions, RenderJobResult } from './jobs/render-job';
export { RenderJob } from './jobs/render-job';
export type { ResolutionPreset } from './export/resolution-presets';
export {
  DEFAULT_PRESET_NAME,
  RESOLUTION_PRESETS,
  findPreset,
  orientSize,
  resolvePresetResolution,
} from './export/resolution-presets';
