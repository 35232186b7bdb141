import * as THREE from 'three';
import type { LightingConfig } from '../core/lighting-config';
import type { Heightmap } from './heightmap';

/** Brightness of a pixel facing away from the light. */
export const AMBIENT_FLOOR = 0.4;
const DIFFUSE_RANGE = 1 - AMBIENT_FLOOR;
const NORMAL_EPSILON = 1e-8;

export interface NormalField {
  width: number;
  height: number;
  x: Float32Array;
  y: Float32Array;
  z: Float32Array;
}

/**
 * Surface normals from central differences. Borders are edge-padded, so a
 * border pixel differences against itself on the outward side.
 */
export function computeNormals(heightmap: Heightmap): NormalField {
  const { width, height, data } = heightmap;
  const count = width * height;
  const nx = new Float32Array(count);
  const ny = new Float32Array(count);
  const nz = new Float32Array(count);

  for (let py = 0; py < height; py++) {
    const up = Math.max(py - 1, 0) * width;
    const down = Math.min(py + 1, height - 1) * width;
    const row = py * width;
    for (let px = 0; px < width; px++) {
      const left = Math.max(px - 1, 0);
      const right = Math.min(px + 1, width - 1);
      const dx = data[row + right] - data[row + left];
      const dy = data[down + px] - data[up + px];

      // Raw normal (-dx, -dy, 1)
      const length = Math.sqrt(dx * dx + dy * dy + 1) + NORMAL_EPSILON;
      const i = row + px;
      nx[i] = -dx / length;
      ny[i] = -dy / length;
      nz[i] = 1 / length;
    }
  }

  return { width, height, x: nx, y: ny, z: nz };
}

/**
 * Unit vector pointing toward the light. Azimuth 0 is +x (rightward),
 * 90 is +y (down the rows); elevation 90 is straight overhead.
 */
export function buildLightVector(lighting: LightingConfig): THREE.Vector3 {
  const az = THREE.MathUtils.degToRad(lighting.azimuthDeg);
  const el = THREE.MathUtils.degToRad(lighting.elevationDeg);
  return new THREE.Vector3(
    Math.cos(el) * Math.cos(az),
    Math.cos(el) * Math.sin(az),
    Math.sin(el)
  ).normalize();
}

/**
 * Lambert term per pixel, clamped to [0, 1].
 */
export function computeShade(normals: NormalField, light: THREE.Vector3): Float32Array {
  const out = new Float32Array(normals.x.length);
  const n = new THREE.Vector3();
  for (let i = 0; i < out.length; i++) {
    n.set(normals.x[i], normals.y[i], normals.z[i]);
    out[i] = THREE.MathUtils.clamp(n.dot(light), 0, 1);
  }
  return out;
}

export function brightnessFactor(shade: number, intensity: number): number {
  return AMBIENT_FLOOR + DIFFUSE_RANGE * shade * intensity;
}

/**
 * Per-pixel brightness multiplier in [0.4, 1] for a heightmap under `lighting`.
 */
export function computeBrightness(heightmap: Heightmap, lighting: LightingConfig): Float32Array {
  const shade = computeShade(computeNormals(heightmap), buildLightVector(lighting));
  const intensity = THREE.MathUtils.clamp(lighting.intensity, 0, 1);
  for (let i = 0; i < shade.length; i++) {
    shade[i] = brightnessFactor(shade[i], intensity);
  }
  return shade;
}
