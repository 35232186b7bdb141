import type { Heightmap } from './heightmap';

/** 8-bit RGBA, row-major, the layout of canvas ImageData. */
export interface RgbaImage {
  width: number;
  height: number;
  data: Uint8ClampedArray;
}

/** 8-bit single-channel image. */
export interface GrayImage {
  width: number;
  height: number;
  data: Uint8ClampedArray;
}

export function createRgbaImage(width: number, height: number): RgbaImage {
  return { width, height, data: new Uint8ClampedArray(width * height * 4) };
}

/**
 * Map [0, 1] heights to 0..255 gray levels.
 */
export function heightmapToGray(heightmap: Heightmap): GrayImage {
  const data = new Uint8ClampedArray(heightmap.data.length);
  for (let i = 0; i < data.length; i++) {
    data[i] = heightmap.data[i] * 255;
  }
  return { width: heightmap.width, height: heightmap.height, data };
}

export function pixelAt(image: RgbaImage, x: number, y: number): [number, number, number, number] {
  const o = (y * image.width + x) * 4;
  const d = image.data;
  return [d[o], d[o + 1], d[o + 2], d[o + 3]];
}
