import type { ConfigIssue } from '../core/errors';
import { ConfigurationError } from '../core/errors';
import type { ProjectConfig } from '../core/project-config';
import { validateDimensions, validateProjectConfig } from '../core/validation';
import { NoiseBank } from '../noise/simplex';
import type { CancelSignal, Rgb } from '../types';
import { createGradientAxis, gradientColor, gradientT } from './gradient-mapper';
import type { Heightmap, LayerMaps } from './heightmap';
import {
  buildHeightmapWithLayerMaps,
  createRawFields,
  finishHeightmap,
  finishLayerMaps,
  sampleHeightRows,
} from './heightmap';
import type { GrayImage, RgbaImage } from './image';
import { createRgbaImage, heightmapToGray } from './image';
import { computeBrightness } from './lighting';

export const DEFAULT_BLOCK_ROWS = 16;

export interface RenderOptions {
  /** Polled after every block of rows. An AbortSignal works here. */
  signal?: CancelSignal;
  onProgress?: (progress: RenderProgress) => void;
  /** Rows computed between cancellation checks */
  blockRows?: number;
  /** Also return normalized base/detail/combined maps */
  includeLayerMaps?: boolean;
  /** Composited under pixels with opacity below 1 */
  background?: Rgb;
  /** 0..1; darkens valleys relative to crests */
  heightInfluence?: number;
}

export type RenderStage = 'heightmap' | 'compose';

export interface RenderProgress {
  stage: RenderStage;
  rowsDone: number;
  totalRows: number;
  /** Overall completion across both stages, 0..1 */
  fraction: number;
}

export type RenderOutcome =
  | {
      status: 'completed';
      image: RgbaImage;
      heightmap: Heightmap;
      layers: LayerMaps | null;
    }
  | { status: 'canceled' };

export interface LayerPreviews {
  base: GrayImage;
  detail: GrayImage;
  combined: GrayImage;
}

const CANCELED: RenderOutcome = { status: 'canceled' };

function resolveOptions(options: RenderOptions) {
  const blockRows = options.blockRows ?? DEFAULT_BLOCK_ROWS;
  const heightInfluence = options.heightInfluence ?? 0;
  const background: Rgb = options.background ?? [0, 0, 0];
  const issues: ConfigIssue[] = [];
  if (!Number.isInteger(blockRows) || blockRows <= 0) {
    issues.push({ field: 'options.blockRows', constraint: 'must be a positive integer' });
  }
  if (!(heightInfluence >= 0 && heightInfluence <= 1)) {
    issues.push({ field: 'options.heightInfluence', constraint: 'must be in [0, 1]' });
  }
  background.forEach((channel, c) => {
    if (!(channel >= 0 && channel <= 255)) {
      issues.push({ field: `options.background[${c}]`, constraint: 'must be in [0, 255]' });
    }
  });
  if (issues.length > 0) throw new ConfigurationError(issues);
  return { blockRows, heightInfluence, background };
}

/**
 * The render pipeline as a generator that yields after each block of rows.
 * Validation happens on the first `next()`, before any pixel is computed.
 * Once the signal is aborted the generator returns `canceled` at its next
 * check and never a completed image.
 */
export function* renderSteps(
  config: ProjectConfig,
  width: number,
  height: number,
  options: RenderOptions = {}
): Generator<RenderProgress, RenderOutcome, void> {
  validateDimensions(width, height);
  validateProjectConfig(config);
  const { blockRows, heightInfluence, background } = resolveOptions(options);
  const { signal } = options;
  const totalWork = height * 2;

  // Heightmap stage
  const bank = new NoiseBank();
  const fields = createRawFields(width, height, options.includeLayerMaps ?? false);
  for (let row = 0; row < height; row += blockRows) {
    if (signal?.aborted) return CANCELED;
    const end = Math.min(row + blockRows, height);
    sampleHeightRows(config.noiseLayers, fields, row, end, bank);
    yield { stage: 'heightmap', rowsDone: end, totalRows: height, fraction: end / totalWork };
  }

  if (signal?.aborted) return CANCELED;
  const heightmap = finishHeightmap(fields, config.noiseLayers);
  const layers = finishLayerMaps(fields);
  const brightness = computeBrightness(heightmap, config.lighting);

  // Compose stage
  const image = createRgbaImage(width, height);
  const axis = createGradientAxis(width, height, config.gradient.angleDeg);
  const { stops } = config.gradient;
  const out = image.data;

  for (let row = 0; row < height; row += blockRows) {
    if (signal?.aborted) return CANCELED;
    const end = Math.min(row + blockRows, height);
    for (let py = row; py < end; py++) {
      for (let px = 0; px < width; px++) {
        const i = py * width + px;
        const { color, opacity } = gradientColor(gradientT(px, py, axis), stops);

        let factor = brightness[i];
        if (heightInfluence > 0) {
          // Valleys down to 80% brightness at full influence
          const heightFactor = 1 - 0.2 * (1 - heightmap.data[i]);
          factor *= 1 - heightInfluence + heightInfluence * heightFactor;
        }

        const o = i * 4;
        out[o] = background[0] * (1 - opacity) + color[0] * factor * opacity;
        out[o + 1] = background[1] * (1 - opacity) + color[1] * factor * opacity;
        out[o + 2] = background[2] * (1 - opacity) + color[2] * factor * opacity;
        out[o + 3] = 255;
      }
    }
    yield {
      stage: 'compose',
      rowsDone: end,
      totalRows: height,
      fraction: (height + end) / totalWork,
    };
  }

  if (signal?.aborted) return CANCELED;
  return { status: 'completed', image, heightmap, layers };
}

/**
 * Render `config` at `width` x `height`. Pure: the same inputs always give
 * byte-identical output. Throws ConfigurationError before doing any work
 * when the config or dimensions are invalid.
 */
export function render(
  config: ProjectConfig,
  width: number,
  height: number,
  options: RenderOptions = {}
): RenderOutcome {
  const steps = renderSteps(config, width, height, options);
  for (;;) {
    const step = steps.next();
    if (step.done) return step.value;
    options.onProgress?.(step.value);
  }
}

/**
 * Base, detail and combined maps as grayscale images, usually at a smaller
 * preview size than the main render.
 */
export function renderLayerPreviews(
  config: ProjectConfig,
  width: number,
  height: number
): LayerPreviews {
  validateDimensions(width, height, 'preview.');
  validateProjectConfig(config);
  const { layers } = buildHeightmapWithLayerMaps(config, width, height);
  return {
    base: heightmapToGray(layers.base),
    detail: heightmapToGray(layers.detail),
    combined: heightmapToGray(layers.combined),
  };
}
