import type { NoiseLayerKind } from '../types';
import { hexToRgb, rgbToHex } from './color';
import { ConfigurationError } from './errors';
import type { GradientConfig, GradientStop } from './gradient-model';
import { sortStops } from './gradient-model';
import type { LightingConfig } from './lighting-config';
import { DEFAULT_LIGHTING } from './lighting-config';
import type { NoiseLayerConfig } from './noise-layer';
import { createNoiseLayer } from './noise-layer';
import type { Palette } from './palette';
import type { ProjectConfig } from './project-config';
import { DEFAULT_SEED_GLOBAL, createDefaultProject } from './project-config';

export const PROJECT_FORMAT_VERSION = 1;

interface SerializedPalette {
  name: string;
  colors: string[];
}

interface SerializedStop {
  position: number;
  color: string;
  opacity: number;
}

interface SerializedGradient {
  angle_deg: number;
  stops: SerializedStop[];
}

interface SerializedNoiseLayer {
  layer_type: NoiseLayerKind;
  enabled: boolean;
  seed: number;
  scale_x: number;
  scale_y: number;
  octaves: number;
  persistence: number;
  lacunarity: number;
  ridge_power: number;
  height_power: number;
  amplitude: number;
}

interface SerializedLighting {
  light_azimuth_deg: number;
  light_elevation_deg: number;
  intensity: number;
}

export interface SerializedProject {
  version: number;
  palette: SerializedPalette;
  gradient: SerializedGradient;
  noise_layers: SerializedNoiseLayer[];
  lighting: SerializedLighting;
  preview_width: number;
  preview_height: number;
  noise_preview_width: number;
  noise_preview_height: number;
  seed_global: number;
}

// --- Writing ---

export function serializePalette(palette: Palette): SerializedPalette {
  return { name: palette.name, colors: [...palette.colors] };
}

export function serializeProject(config: ProjectConfig): SerializedProject {
  return {
    version: PROJECT_FORMAT_VERSION,
    palette: serializePalette(config.palette),
    gradient: {
      angle_deg: config.gradient.angleDeg,
      stops: config.gradient.stops.map((s) => ({
        position: s.position,
        color: rgbToHex(s.color),
        opacity: s.opacity,
      })),
    },
    noise_layers: config.noiseLayers.map((l) => ({
      layer_type: l.kind,
      enabled: l.enabled,
      seed: l.seed,
      scale_x: l.scaleX,
      scale_y: l.scaleY,
      octaves: l.octaves,
      persistence: l.persistence,
      lacunarity: l.lacunarity,
      ridge_power: l.ridgePower,
      height_power: l.heightPower,
      amplitude: l.amplitude,
    })),
    lighting: {
      light_azimuth_deg: config.lighting.azimuthDeg,
      light_elevation_deg: config.lighting.elevationDeg,
      intensity: config.lighting.intensity,
    },
    preview_width: config.previewWidth,
    preview_height: config.previewHeight,
    noise_preview_width: config.noisePreviewWidth,
    noise_preview_height: config.noisePreviewHeight,
    seed_global: config.seedGlobal,
  };
}

export function projectToJson(config: ProjectConfig): string {
  return JSON.stringify(serializeProject(config), null, 2);
}

// --- Reading ---
// Missing keys take their defaults; keys of the wrong type are rejected.

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function objectAt(data: JsonObject, key: string, field: string): JsonObject {
  const value = data[key];
  if (value === undefined || value === null) return {};
  if (!isObject(value)) throw ConfigurationError.single(field, 'must be an object');
  return value;
}

function arrayAt(data: JsonObject, key: string, field: string): unknown[] {
  const value = data[key];
  if (value === undefined) return [];
  if (!Array.isArray(value)) throw ConfigurationError.single(field, 'must be an array');
  return value;
}

function numberAt(data: JsonObject, key: string, fallback: number, field: string): number {
  const value = data[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'number') throw ConfigurationError.single(field, 'must be a number');
  return value;
}

function stringAt(data: JsonObject, key: string, fallback: string, field: string): string {
  const value = data[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string') throw ConfigurationError.single(field, 'must be a string');
  return value;
}

function booleanAt(data: JsonObject, key: string, fallback: boolean, field: string): boolean {
  const value = data[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') throw ConfigurationError.single(field, 'must be a boolean');
  return value;
}

function asObject(value: unknown, field: string): JsonObject {
  if (!isObject(value)) throw ConfigurationError.single(field, 'must be an object');
  return value;
}

function toLayerKind(value: string): NoiseLayerKind {
  if (value === 'warp' || value === 'detail') return value;
  // Unknown types load as base layers
  return 'base';
}

export function deserializePalette(data: unknown, field = 'palette'): Palette {
  const obj = asObject(data, field);
  const colors = arrayAt(obj, 'colors', `${field}.colors`).map((c, i) => {
    if (typeof c !== 'string') throw ConfigurationError.single(`${field}.colors[${i}]`, 'must be a string');
    return c;
  });
  return { name: stringAt(obj, 'name', 'unnamed', `${field}.name`), colors };
}

function deserializeStop(data: unknown, field: string): GradientStop {
  const obj = asObject(data, field);
  return {
    position: numberAt(obj, 'position', 0, `${field}.position`),
    color: hexToRgb(stringAt(obj, 'color', '#000000', `${field}.color`), `${field}.color`),
    opacity: numberAt(obj, 'opacity', 1, `${field}.opacity`),
  };
}

function deserializeGradient(data: JsonObject): GradientConfig {
  const stops = arrayAt(data, 'stops', 'gradient.stops').map((s, i) =>
    deserializeStop(s, `gradient.stops[${i}]`)
  );
  return {
    stops: sortStops(stops),
    angleDeg: numberAt(data, 'angle_deg', 20, 'gradient.angle_deg'),
  };
}

function deserializeNoiseLayer(data: unknown, field: string): NoiseLayerConfig {
  const obj = asObject(data, field);
  const defaults = createNoiseLayer('base');
  const num = (key: string, fallback: number) => numberAt(obj, key, fallback, `${field}.${key}`);
  return createNoiseLayer(toLayerKind(stringAt(obj, 'layer_type', 'base', `${field}.layer_type`)), {
    enabled: booleanAt(obj, 'enabled', true, `${field}.enabled`),
    seed: num('seed', defaults.seed),
    scaleX: num('scale_x', defaults.scaleX),
    scaleY: num('scale_y', defaults.scaleY),
    octaves: num('octaves', defaults.octaves),
    persistence: num('persistence', defaults.persistence),
    lacunarity: num('lacunarity', defaults.lacunarity),
    ridgePower: num('ridge_power', defaults.ridgePower),
    heightPower: num('height_power', defaults.heightPower),
    amplitude: num('amplitude', defaults.amplitude),
  });
}

function deserializeLighting(data: JsonObject): LightingConfig {
  return {
    azimuthDeg: numberAt(data, 'light_azimuth_deg', DEFAULT_LIGHTING.azimuthDeg, 'lighting.light_azimuth_deg'),
    elevationDeg: numberAt(
      data,
      'light_elevation_deg',
      DEFAULT_LIGHTING.elevationDeg,
      'lighting.light_elevation_deg'
    ),
    intensity: numberAt(data, 'intensity', DEFAULT_LIGHTING.intensity, 'lighting.intensity'),
  };
}

/**
 * Build a project from parsed JSON. Shapes are checked here; value ranges
 * are left to validateProjectConfig so that an out-of-range project can
 * still be loaded and fixed.
 */
export function deserializeProject(data: unknown): ProjectConfig {
  const obj = asObject(data, 'project');
  const version = numberAt(obj, 'version', PROJECT_FORMAT_VERSION, 'version');
  if (version > PROJECT_FORMAT_VERSION) {
    throw ConfigurationError.single('version', `unsupported format version ${version}`);
  }

  const defaults = createDefaultProject();
  return {
    palette: deserializePalette(objectAt(obj, 'palette', 'palette')),
    gradient: deserializeGradient(objectAt(obj, 'gradient', 'gradient')),
    noiseLayers: arrayAt(obj, 'noise_layers', 'noise_layers').map((l, i) =>
      deserializeNoiseLayer(l, `noise_layers[${i}]`)
    ),
    lighting: deserializeLighting(objectAt(obj, 'lighting', 'lighting')),
    previewWidth: numberAt(obj, 'preview_width', defaults.previewWidth, 'preview_width'),
    previewHeight: numberAt(obj, 'preview_height', defaults.previewHeight, 'preview_height'),
    noisePreviewWidth: numberAt(
      obj,
      'noise_preview_width',
      defaults.noisePreviewWidth,
      'noise_preview_width'
    ),
    noisePreviewHeight: numberAt(
      obj,
      'noise_preview_height',
      defaults.noisePreviewHeight,
      'noise_preview_height'
    ),
    seedGlobal: numberAt(obj, 'seed_global', DEFAULT_SEED_GLOBAL, 'seed_global'),
  };
}

export function projectFromJson(text: string): ProjectConfig {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw ConfigurationError.single('project', `not valid JSON: ${reason}`);
  }
  return deserializeProject(data);
}

// --- Palette collections ---

export function serializePalettes(palettes: Palette[]): SerializedPalette[] {
  return palettes.map(serializePalette);
}

/**
 * Read a list of palettes. A single palette object is accepted as a list of
 * one; non-object entries are skipped.
 */
export function deserializePalettes(data: unknown): Palette[] {
  if (isObject(data)) return [deserializePalette(data)];
  if (!Array.isArray(data)) throw ConfigurationError.single('palettes', 'must be an array');
  const result: Palette[] = [];
  data.forEach((item, i) => {
    if (isObject(item)) result.push(deserializePalette(item, `palettes[${i}]`));
  });
  return result;
}
