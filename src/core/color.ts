import * as THREE from 'three';
import type { Rgb } from '../types';
import { ConfigurationError } from './errors';

const HEX_PATTERN = /^#?([0-9a-f]{6})$/i;

/**
 * Parse `#rrggbb` (leading `#` optional) into 0-255 channels.
 */
export function hexToRgb(hex: string, field = 'color'): Rgb {
  const match = HEX_PATTERN.exec(hex.trim());
  if (!match) {
    throw ConfigurationError.single(field, `expected a #rrggbb color, got ${JSON.stringify(hex)}`);
  }
  const value = Number.parseInt(match[1], 16);
  return [(value >> 16) & 0xff, (value >> 8) & 0xff, value & 0xff];
}

export function rgbToHex(color: Rgb): string {
  const channel = (c: number) =>
    THREE.MathUtils.clamp(Math.round(c), 0, 255).toString(16).padStart(2, '0');
  return `#${channel(color[0])}${channel(color[1])}${channel(color[2])}`;
}

export function lerpRgb(a: Rgb, b: Rgb, t: number): Rgb {
  return [
    THREE.MathUtils.lerp(a[0], b[0], t),
    THREE.MathUtils.lerp(a[1], b[1], t),
    THREE.MathUtils.lerp(a[2], b[2], t),
  ];
}
