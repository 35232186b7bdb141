import { describe, it, expect } from 'vitest';
import {
  deserializePalette,
  deserializePalettes,
  deserializeProject,
  projectFromJson,
  projectToJson,
  serializePalettes,
  serializeProject,
} from '../../src/core/serialization';
import { createDefaultProject } from '../../src/core/project-config';
import { ConfigurationError } from '../../src/core/errors';
import { FROST_PALETTE } from '../../src/core/palette';

function fieldOf(fn: () => unknown): string {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) return error.issues[0].field;
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

describe('serializeProject', () => {
  it('writes snake_case keys and hex colors', () => {
    const data = serializeProject(createDefaultProject());
    expect(data.version).toBe(1);
    expect(data.gradient.angle_deg).toBe(20);
    expect(data.gradient.stops[0]).toEqual({ position: 0, color: '#000814', opacity: 1 });
    expect(data.noise_layers[0]).toEqual({
      layer_type: 'warp',
      enabled: true,
      seed: 42,
      scale_x: 0.2,
      scale_y: 0.05,
      octaves: 2,
      persistence: 0.5,
      lacunarity: 2,
      ridge_power: 1,
      height_power: 1,
      amplitude: 0.5,
    });
    expect(data.lighting).toEqual({ light_azimuth_deg: 45, light_elevation_deg: 60, intensity: 0.8 });
    expect(data.preview_width).toBe(960);
    expect(data.noise_preview_height).toBe(270);
    expect(data.seed_global).toBe(42);
  });

  it('round-trips through JSON', () => {
    const config = createDefaultProject(7);
    config.gradient.angleDeg = 135;
    config.noiseLayers[2].enabled = false;
    expect(projectFromJson(projectToJson(config))).toEqual(config);
    expect(deserializeProject(serializeProject(config))).toEqual(config);
  });
});

describe('deserializeProject', () => {
  it('fills missing keys with defaults', () => {
    const config = deserializeProject({});
    expect(config.palette).toEqual({ name: 'unnamed', colors: [] });
    expect(config.gradient).toEqual({ stops: [], angleDeg: 20 });
    expect(config.noiseLayers).toEqual([]);
    expect(config.lighting).toEqual({ azimuthDeg: 45, elevationDeg: 60, intensity: 0.8 });
    expect(config.previewWidth).toBe(960);
    expect(config.previewHeight).toBe(540);
    expect(config.seedGlobal).toBe(42);
  });

  it('loads unknown layer types as base layers', () => {
    const config = deserializeProject({ noise_layers: [{ layer_type: 'ripple', seed: 3 }] });
    expect(config.noiseLayers[0]).toMatchObject({ kind: 'base', seed: 3, scaleX: 1.5, octaves: 5 });
  });

  it('sorts stops by position', () => {
    const config = deserializeProject({
      gradient: {
        stops: [
          { position: 1, color: '#ffffff' },
          { position: 0, color: '#000000', opacity: 0.5 },
        ],
      },
    });
    expect(config.gradient.stops).toEqual([
      { position: 0, color: [0, 0, 0], opacity: 0.5 },
      { position: 1, color: [255, 255, 255], opacity: 1 },
    ]);
  });

  it('leaves range checks to validation', () => {
    const config = deserializeProject({ noise_layers: [{ octaves: 20 }] });
    expect(config.noiseLayers[0].octaves).toBe(20);
  });

  it('rejects values of the wrong type by field', () => {
    expect(fieldOf(() => deserializeProject({ preview_width: '960' }))).toBe('preview_width');
    expect(fieldOf(() => deserializeProject({ noise_layers: [{ scale_x: 'wide' }] }))).toBe(
      'noise_layers[0].scale_x'
    );
    expect(fieldOf(() => deserializeProject({ noise_layers: {} }))).toBe('noise_layers');
    expect(fieldOf(() => deserializeProject({ gradient: { stops: [{ color: 'teal' }] } }))).toBe(
      'gradient.stops[0].color'
    );
    expect(fieldOf(() => deserializeProject([]))).toBe('project');
  });

  it('rejects newer format versions', () => {
    expect(fieldOf(() => deserializeProject({ version: 2 }))).toBe('version');
  });

  it('wraps JSON syntax errors', () => {
    expect(fieldOf(() => projectFromJson('{"palette":'))).toBe('project');
  });
});

describe('palettes', () => {
  it('round-trips a list', () => {
    const palettes = [FROST_PALETTE, { name: 'ember', colors: ['#ff4500'] }];
    expect(deserializePalettes(serializePalettes(palettes))).toEqual(palettes);
  });

  it('accepts a single palette object', () => {
    expect(deserializePalettes({ name: 'solo', colors: ['#123456'] })).toEqual([
      { name: 'solo', colors: ['#123456'] },
    ]);
  });

  it('skips entries that are not objects', () => {
    expect(deserializePalettes([{ name: 'a' }, 'b', 3])).toEqual([{ name: 'a', colors: [] }]);
  });

  it('rejects non-string colors', () => {
    expect(fieldOf(() => deserializePalette({ colors: ['#000000', 5] }))).toBe('palette.colors[1]');
  });
});
