import { ConfigurationError } from '../core/errors';
import type { Orientation, Size } from '../types';

export interface ResolutionPreset {
  name: string;
  width: number;
  height: number;
}

export const RESOLUTION_PRESETS: readonly ResolutionPreset[] = [
  { name: '1920 x 1080 (16:9)', width: 1920, height: 1080 },
  { name: '1280 x 720 (16:9)', width: 1280, height: 720 },
  { name: '1080 x 1920 (Portrait 16:9)', width: 1080, height: 1920 },
  { name: '1024 x 768 (4:3)', width: 1024, height: 768 },
];

export const DEFAULT_PRESET_NAME = RESOLUTION_PRESETS[0].name;

export function findPreset(name: string): ResolutionPreset | undefined {
  return RESOLUTION_PRESETS.find((p) => p.name === name);
}

/**
 * Apply `orientation` to a size: the long side runs horizontally for
 * landscape and vertically for portrait. Square sizes pass through.
 */
export function orientSize(size: Size, orientation: Orientation): Size {
  const { width, height } = size;
  if (orientation === 'portrait' && width > height) return { width: height, height: width };
  if (orientation === 'landscape' && height > width) return { width: height, height: width };
  return { width, height };
}

export function resolvePresetResolution(name: string, orientation: Orientation): Size {
  const preset = findPreset(name);
  if (!preset) {
    throw ConfigurationError.single('export.preset', `unknown preset "${name}"`);
  }
  return orientSize(preset, orientation);
}
