import { describe, it, expect } from 'vitest';
import {
  collectConfigIssues,
  validateDimensions,
  validateProjectConfig,
} from '../../src/core/validation';
import { ConfigurationError } from '../../src/core/errors';
import {
  createDefaultProject,
  deriveLayerSeeds,
  snapshotProject,
} from '../../src/core/project-config';
import type { ProjectConfig } from '../../src/core/project-config';
import { createNoiseLayer } from '../../src/core/noise-layer';
import type { GradientStop } from '../../src/core/gradient-model';

function catchConfigError(fn: () => void): ConfigurationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) return error;
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

function editLayer(index: number, patch: Partial<ProjectConfig['noiseLayers'][number]>): ProjectConfig {
  const config = createDefaultProject();
  config.noiseLayers[index] = { ...config.noiseLayers[index], ...patch };
  return config;
}

describe('createDefaultProject', () => {
  it('builds the warp, base and detail layers with consecutive seeds', () => {
    const config = createDefaultProject();
    expect(config.noiseLayers.map((l) => l.kind)).toEqual(['warp', 'base', 'detail']);
    expect(config.noiseLayers.map((l) => l.seed)).toEqual([42, 43, 44]);
    expect(config.seedGlobal).toBe(42);
    expect(config.palette.name).toBe('frost');
  });

  it('derives seeds from the global seed', () => {
    const layers = deriveLayerSeeds([createNoiseLayer('base'), createNoiseLayer('detail')], 7);
    expect(layers.map((l) => l.seed)).toEqual([7, 8]);
    expect(createDefaultProject(100).noiseLayers[2].seed).toBe(102);
  });

  it('snapshots deeply', () => {
    const config = createDefaultProject();
    const snapshot = snapshotProject(config);
    config.noiseLayers[1].seed = 999;
    config.gradient.stops[0].color[0] = 255;
    expect(snapshot.noiseLayers[1].seed).toBe(43);
    expect(snapshot.gradient.stops[0].color[0]).toBe(0);
  });
});

describe('validateProjectConfig', () => {
  it('accepts the default project', () => {
    expect(collectConfigIssues(createDefaultProject())).toEqual([]);
    expect(() => validateProjectConfig(createDefaultProject())).not.toThrow();
  });

  it('reports a non-positive scale by field path', () => {
    expect(collectConfigIssues(editLayer(1, { scaleX: 0 }))).toEqual([
      { field: 'noiseLayers[1].scaleX', constraint: 'must be greater than 0' },
    ]);
  });

  it('checks octave count and type', () => {
    expect(collectConfigIssues(editLayer(0, { octaves: 9 }))).toEqual([
      { field: 'noiseLayers[0].octaves', constraint: 'must be in [1, 8]' },
    ]);
    expect(collectConfigIssues(editLayer(0, { octaves: 2.5 }))).toEqual([
      { field: 'noiseLayers[0].octaves', constraint: 'must be an integer' },
    ]);
  });

  it('checks layer powers, amplitude and seed', () => {
    const issues = collectConfigIssues(
      editLayer(2, { ridgePower: 0.5, heightPower: 0.9, amplitude: -1, seed: 1.5 })
    );
    expect(issues).toEqual([
      { field: 'noiseLayers[2].seed', constraint: 'must be an integer' },
      { field: 'noiseLayers[2].ridgePower', constraint: 'must be at least 1' },
      { field: 'noiseLayers[2].heightPower', constraint: 'must be at least 1' },
      { field: 'noiseLayers[2].amplitude', constraint: 'must not be negative' },
    ]);
  });

  it('rejects non-finite numbers', () => {
    expect(collectConfigIssues(editLayer(1, { scaleY: Number.NaN }))).toEqual([
      { field: 'noiseLayers[1].scaleY', constraint: 'must be a finite number' },
    ]);
  });

  it('requires two to six stops', () => {
    const config = createDefaultProject();
    config.gradient.stops = config.gradient.stops.slice(0, 1);
    expect(collectConfigIssues(config)).toEqual([
      { field: 'gradient.stops', constraint: 'at least 2 stops are required' },
    ]);

    const crowded = createDefaultProject();
    crowded.gradient.stops = Array.from({ length: 7 }, (_, i): GradientStop => ({
      position: i / 6,
      color: [0, 0, 0],
      opacity: 1,
    }));
    expect(collectConfigIssues(crowded)).toEqual([
      { field: 'gradient.stops', constraint: 'at most 6 stops are allowed' },
    ]);
  });

  it('rejects unsorted stops', () => {
    const config = createDefaultProject();
    config.gradient.stops = [
      { position: 0.5, color: [0, 0, 0], opacity: 1 },
      { position: 0.2, color: [255, 255, 255], opacity: 1 },
    ];
    expect(collectConfigIssues(config)).toEqual([
      { field: 'gradient.stops[1].position', constraint: 'stops must be sorted by ascending position' },
    ]);
  });

  it('checks stop channels, opacity and the angle', () => {
    const config = createDefaultProject();
    config.gradient.stops[0] = { position: 0, color: [256, 10.5, 0], opacity: 1.5 };
    config.gradient.angleDeg = 360;
    expect(collectConfigIssues(config)).toEqual([
      { field: 'gradient.stops[0].opacity', constraint: 'must be in [0, 1]' },
      { field: 'gradient.stops[0].color[0]', constraint: 'must be in [0, 255]' },
      { field: 'gradient.stops[0].color[1]', constraint: 'must be an integer' },
      { field: 'gradient.angleDeg', constraint: 'must be in [0, 360)' },
    ]);
  });

  it('checks lighting ranges', () => {
    const config = createDefaultProject();
    config.lighting = { azimuthDeg: -1, elevationDeg: 95, intensity: 2 };
    expect(collectConfigIssues(config).map((i) => i.field)).toEqual([
      'lighting.azimuthDeg',
      'lighting.elevationDeg',
      'lighting.intensity',
    ]);
  });

  it('throws every issue at once', () => {
    const config = editLayer(1, { scaleX: -1, octaves: 0 });
    const error = catchConfigError(() => validateProjectConfig(config));
    expect(error.issues).toHaveLength(2);
    expect(error.message).toBe(
      'Invalid configuration (2 issues): noiseLayers[1].scaleX: must be greater than 0; ' +
        'noiseLayers[1].octaves: must be in [1, 8]'
    );
  });
});

describe('validateDimensions', () => {
  it('requires positive integers', () => {
    expect(() => validateDimensions(64, 36)).not.toThrow();
    expect(catchConfigError(() => validateDimensions(0, 10)).issues).toEqual([
      { field: 'width', constraint: 'must be a positive integer' },
    ]);
    expect(catchConfigError(() => validateDimensions(10, 7.5)).issues).toEqual([
      { field: 'height', constraint: 'must be an integer' },
    ]);
  });

  it('prefixes field names', () => {
    expect(catchConfigError(() => validateDimensions(-4, 0, 'preview.')).issues.map((i) => i.field)).toEqual([
      'preview.width',
      'preview.height',
    ]);
  });
});

describe('ConfigurationError', () => {
  it('names a single issue', () => {
    const error = ConfigurationError.single('lighting.intensity', 'must be in [0, 1]');
    expect(error.name).toBe('ConfigurationError');
    expect(error.message).toBe('Invalid configuration (1 issue): lighting.intensity: must be in [0, 1]');
    expect(error).toBeInstanceOf(Error);
  });
});
