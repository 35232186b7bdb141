import { describe, it, expect } from 'vitest';
import {
  DEFAULT_PRESET_NAME,
  RESOLUTION_PRESETS,
  findPreset,
  orientSize,
  resolvePresetResolution,
} from '../../src/export/resolution-presets';
import { ConfigurationError } from '../../src/core/errors';

describe('resolution presets', () => {
  it('lists the export sizes', () => {
    expect(RESOLUTION_PRESETS.map((p) => [p.width, p.height])).toEqual([
      [1920, 1080],
      [1280, 720],
      [1080, 1920],
      [1024, 768],
    ]);
    expect(DEFAULT_PRESET_NAME).toBe('1920 x 1080 (16:9)');
    expect(findPreset('640 x 480')).toBeUndefined();
  });

  it('keeps a landscape preset in landscape', () => {
    expect(resolvePresetResolution('1280 x 720 (16:9)', 'landscape')).toEqual({ width: 1280, height: 720 });
  });

  it('swaps sides for the other orientation', () => {
    expect(resolvePresetResolution('1024 x 768 (4:3)', 'portrait')).toEqual({ width: 768, height: 1024 });
    expect(resolvePresetResolution('1080 x 1920 (Portrait 16:9)', 'landscape')).toEqual({
      width: 1920,
      height: 1080,
    });
    expect(resolvePresetResolution('1080 x 1920 (Portrait 16:9)', 'portrait')).toEqual({
      width: 1080,
      height: 1920,
    });
  });

  it('leaves square sizes alone', () => {
    expect(orientSize({ width: 512, height: 512 }, 'portrait')).toEqual({ width: 512, height: 512 });
  });

  it('rejects unknown preset names', () => {
    expect(() => resolvePresetResolution('8K', 'landscape')).toThrow(ConfigurationError);
  });
});
