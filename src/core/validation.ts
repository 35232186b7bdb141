import type { ConfigIssue } from './errors';
import { ConfigurationError } from './errors';
import type { GradientConfig } from './gradient-model';
import { MAX_STOPS, MIN_STOPS } from './gradient-model';
import type { LightingConfig } from './lighting-config';
import type { NoiseLayerConfig } from './noise-layer';
import { MAX_OCTAVES, MIN_OCTAVES } from './noise-layer';
import type { ProjectConfig } from './project-config';

const LAYER_KINDS = new Set(['base', 'detail', 'warp']);

class IssueCollector {
  readonly issues: ConfigIssue[] = [];

  add(field: string, constraint: string): void {
    this.issues.push({ field, constraint });
  }

  finite(field: string, value: number): boolean {
    if (!Number.isFinite(value)) {
      this.add(field, 'must be a finite number');
      return false;
    }
    return true;
  }

  range(field: string, value: number, min: number, max: number, maxExclusive = false): void {
    if (!this.finite(field, value)) return;
    const aboveMax = maxExclusive ? value >= max : value > max;
    if (value < min || aboveMax) {
      this.add(field, `must be in [${min}, ${max}${maxExclusive ? ')' : ']'}`);
    }
  }

  integer(field: string, value: number): boolean {
    if (!Number.isInteger(value)) {
      this.add(field, 'must be an integer');
      return false;
    }
    return true;
  }
}

function checkGradient(gradient: GradientConfig, out: IssueCollector): void {
  const { stops } = gradient;
  if (stops.length < MIN_STOPS) {
    out.add('gradient.stops', `at least ${MIN_STOPS} stops are required`);
  } else if (stops.length > MAX_STOPS) {
    out.add('gradient.stops', `at most ${MAX_STOPS} stops are allowed`);
  }

  stops.forEach((stop, i) => {
    const field = `gradient.stops[${i}]`;
    out.range(`${field}.position`, stop.position, 0, 1);
    out.range(`${field}.opacity`, stop.opacity, 0, 1);
    stop.color.forEach((channel, c) => {
      const channelField = `${field}.color[${c}]`;
      if (out.integer(channelField, channel)) {
        out.range(channelField, channel, 0, 255);
      }
    });
    const previous = stops[i - 1];
    if (previous && stop.position < previous.position) {
      out.add(`${field}.position`, 'stops must be sorted by ascending position');
    }
  });

  out.range('gradient.angleDeg', gradient.angleDeg, 0, 360, true);
}

function checkLayer(layer: NoiseLayerConfig, index: number, out: IssueCollector): void {
  const field = `noiseLayers[${index}]`;
  if (!LAYER_KINDS.has(layer.kind)) {
    out.add(`${field}.kind`, "must be one of 'base', 'detail', 'warp'");
  }
  out.integer(`${field}.seed`, layer.seed);

  for (const axis of ['scaleX', 'scaleY'] as const) {
    const value = layer[axis];
    if (out.finite(`${field}.${axis}`, value) && value <= 0) {
      out.add(`${field}.${axis}`, 'must be greater than 0');
    }
  }

  if (out.integer(`${field}.octaves`, layer.octaves)) {
    out.range(`${field}.octaves`, layer.octaves, MIN_OCTAVES, MAX_OCTAVES);
  }

  if (out.finite(`${field}.persistence`, layer.persistence) && layer.persistence <= 0) {
    out.add(`${field}.persistence`, 'must be greater than 0');
  }
  if (out.finite(`${field}.lacunarity`, layer.lacunarity) && layer.lacunarity <= 0) {
    out.add(`${field}.lacunarity`, 'must be greater than 0');
  }
  if (out.finite(`${field}.ridgePower`, layer.ridgePower) && layer.ridgePower < 1) {
    out.add(`${field}.ridgePower`, 'must be at least 1');
  }
  if (out.finite(`${field}.heightPower`, layer.heightPower) && layer.heightPower < 1) {
    out.add(`${field}.heightPower`, 'must be at least 1');
  }
  if (out.finite(`${field}.amplitude`, layer.amplitude) && layer.amplitude < 0) {
    out.add(`${field}.amplitude`, 'must not be negative');
  }
}

function checkLighting(lighting: LightingConfig, out: IssueCollector): void {
  out.range('lighting.azimuthDeg', lighting.azimuthDeg, 0, 360, true);
  out.range('lighting.elevationDeg', lighting.elevationDeg, 0, 90);
  out.range('lighting.intensity', lighting.intensity, 0, 1);
}

/**
 * Collect every problem that would prevent `config` from rendering.
 */
export function collectConfigIssues(config: ProjectConfig): ConfigIssue[] {
  const out = new IssueCollector();
  checkGradient(config.gradient, out);
  config.noiseLayers.forEach((layer, i) => checkLayer(layer, i, out));
  checkLighting(config.lighting, out);
  return out.issues;
}

export function validateProjectConfig(config: ProjectConfig): void {
  const issues = collectConfigIssues(config);
  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }
}

export function validateDimensions(width: number, height: number, prefix = ''): void {
  const out = new IssueCollector();
  for (const [name, value] of [['width', width], ['height', height]] as const) {
    const field = `${prefix}${name}`;
    if (out.integer(field, value) && value <= 0) {
      out.add(field, 'must be a positive integer');
    }
  }
  if (out.issues.length > 0) {
    throw new ConfigurationError(out.issues);
  }
}
