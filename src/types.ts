// Dune Render - Shared types

export type Vec2 = [number, number];
export type Vec3 = [number, number, number];
export type Rgb = [number, number, number]; // 0-255 per channel

// Role of a noise layer in the composition
export type NoiseLayerKind = 'base' | 'detail' | 'warp';

export type Orientation = 'landscape' | 'portrait';

export interface Size {
  width: number;
  height: number;
}

/**
 * Anything that can be polled for a cancellation request.
 * AbortSignal satisfies this shape.
 */
export interface CancelSignal {
  readonly aborted: boolean;
}
