import * as THREE from 'three';
import { lerpRgb } from '../core/color';
import { ConfigurationError } from '../core/errors';
import type { GradientStop } from '../core/gradient-model';
import { MIN_STOPS } from '../core/gradient-model';
import type { Rgb } from '../types';

export interface GradientSample {
  color: Rgb;
  opacity: number;
}

/**
 * Projection of the image onto the gradient direction, precomputed once
 * per render.
 */
export interface GradientAxis {
  width: number;
  height: number;
  dirX: number;
  dirY: number;
  minProjection: number;
  range: number;
}

const DEGENERATE_RANGE = 1e-8;

function sampleOf(stop: GradientStop): GradientSample {
  return { color: [...stop.color], opacity: stop.opacity };
}

/**
 * Color and opacity at `t` along sorted stops. Outside the stop range the
 * nearest endpoint is used; an exact hit returns that stop (the last one
 * when positions repeat).
 */
export function gradientColor(t: number, stops: readonly GradientStop[]): GradientSample {
  if (stops.length < MIN_STOPS) {
    throw ConfigurationError.single('gradient.stops', `at least ${MIN_STOPS} stops are required`);
  }

  const first = stops[0];
  const last = stops[stops.length - 1];
  if (t < first.position) return sampleOf(first);
  if (t >= last.position) return sampleOf(last);

  // Last stop at or before t
  let i = 0;
  while (i + 1 < stops.length && stops[i + 1].position <= t) i++;

  const left = stops[i];
  if (left.position === t) return sampleOf(left);

  const right = stops[i + 1];
  const f = (t - left.position) / (right.position - left.position);
  return {
    color: lerpRgb(left.color, right.color, f),
    opacity: THREE.MathUtils.lerp(left.opacity, right.opacity, f),
  };
}

// Pixel centre relative to the image middle, in [-0.5, 0.5].
function centered(p: number, extent: number): number {
  return extent > 1 ? p / (extent - 1) - 0.5 : -0.5;
}

/**
 * Axis at `angleDeg`: 0 runs left to right, 90 bottom to top.
 */
export function createGradientAxis(width: number, height: number, angleDeg: number): GradientAxis {
  const angle = THREE.MathUtils.degToRad(angleDeg);
  const dirX = Math.cos(angle);
  // Rows grow downward, so "up" is -y.
  const dirY = -Math.sin(angle);

  const xs = [centered(0, width), centered(width - 1, width)];
  const ys = [centered(0, height), centered(height - 1, height)];
  let min = Infinity;
  let max = -Infinity;
  for (const cx of xs) {
    for (const cy of ys) {
      const p = cx * dirX + cy * dirY;
      min = Math.min(min, p);
      max = Math.max(max, p);
    }
  }

  return { width, height, dirX, dirY, minProjection: min, range: max - min };
}

export function gradientT(px: number, py: number, axis: GradientAxis): number {
  if (axis.range <= DEGENERATE_RANGE) return 0;
  const p = centered(px, axis.width) * axis.dirX + centered(py, axis.height) * axis.dirY;
  return THREE.MathUtils.clamp((p - axis.minProjection) / axis.range, 0, 1);
}
