import { ConfigurationError } from '../core/errors';
import type { ProjectConfig } from '../core/project-config';
import { snapshotProject } from '../core/project-config';
import { validateDimensions } from '../core/validation';
import type { RgbaImage } from '../rendering/image';
import type { LayerPreviews, RenderOutcome } from '../rendering/renderer';
import { renderLayerPreviews, renderSteps } from '../rendering/renderer';

export interface RenderJobOptions {
  /** Defaults to the project's previewWidth */
  width?: number;
  /** Defaults to the project's previewHeight */
  height?: number;
  /** Also render base/detail/combined previews at the noise preview size */
  generateNoisePreviews?: boolean;
  blockRows?: number;
}

export type RenderJobResult =
  | {
      status: 'finished';
      image: RgbaImage;
      previews: LayerPreviews | null;
      totalSeconds: number;
    }
  | { status: 'canceled' }
  | { status: 'failed'; error: ConfigurationError };

interface RenderJobEvents {
  started: undefined;
  progress: { elapsedSeconds: number; fraction: number };
  finished: { image: RgbaImage; previews: LayerPreviews | null; totalSeconds: number };
  canceled: undefined;
  failed: { error: Error };
}

type RenderJobEventType = keyof RenderJobEvents;
type RenderJobEventHandler<K extends RenderJobEventType> = (data: RenderJobEvents[K]) => void;
type ListenerTable = { [K in RenderJobEventType]: RenderJobEventHandler<K>[] };

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Runs one render off the caller's stack. The project is copied on
 * construction, so edits made while the job runs do not reach it.
 * Work proceeds in row blocks with an event-loop turn between them,
 * which is where `cancel()` gets observed.
 */
export class RenderJob {
  readonly width: number;
  readonly height: number;
  private readonly config: ProjectConfig;
  private readonly generateNoisePreviews: boolean;
  private readonly blockRows: number | undefined;
  private readonly controller = new AbortController();
  private listeners: ListenerTable = {
    started: [],
    progress: [],
    finished: [],
    canceled: [],
    failed: [],
  };
  private started = false;

  constructor(config: ProjectConfig, options: RenderJobOptions = {}) {
    this.config = snapshotProject(config);
    this.width = options.width ?? config.previewWidth;
    this.height = options.height ?? config.previewHeight;
    this.generateNoisePreviews = options.generateNoisePreviews ?? true;
    this.blockRows = options.blockRows;
  }

  get isCanceled(): boolean {
    return this.controller.signal.aborted;
  }

  cancel(): void {
    this.controller.abort();
  }

  on<K extends RenderJobEventType>(event: K, handler: RenderJobEventHandler<K>): void {
    this.listeners[event].push(handler);
  }

  async run(): Promise<RenderJobResult> {
    if (this.started) {
      throw new Error('RenderJob.run() may only be called once');
    }
    this.started = true;

    const startTime = performance.now();
    const elapsed = () => (performance.now() - startTime) / 1000;
    this.emit('started', undefined);

    if (this.isCanceled) return this.finishCanceled();

    let outcome: RenderOutcome;
    try {
      if (this.generateNoisePreviews) {
        validateDimensions(this.config.noisePreviewWidth, this.config.noisePreviewHeight, 'preview.');
      }
      outcome = await this.drive(elapsed);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        console.warn(`[RenderJob] Render rejected: ${error.message}`);
        this.emit('failed', { error });
        return { status: 'failed', error };
      }
      if (error instanceof Error) this.emit('failed', { error });
      throw error;
    }

    if (outcome.status === 'canceled' || this.isCanceled) return this.finishCanceled();

    let previews: LayerPreviews | null = null;
    if (this.generateNoisePreviews) {
      previews = renderLayerPreviews(
        this.config,
        this.config.noisePreviewWidth,
        this.config.noisePreviewHeight
      );
      this.emit('progress', { elapsedSeconds: elapsed(), fraction: 1 });
    }

    if (this.isCanceled) return this.finishCanceled();

    const totalSeconds = elapsed();
    console.log(
      `[RenderJob] Rendered ${this.width}x${this.height} in ${totalSeconds.toFixed(2)}s`
    );
    this.emit('finished', { image: outcome.image, previews, totalSeconds });
    return { status: 'finished', image: outcome.image, previews, totalSeconds };
  }

  private async drive(elapsed: () => number): Promise<RenderOutcome> {
    const steps = renderSteps(this.config, this.width, this.height, {
      signal: this.controller.signal,
      blockRows: this.blockRows,
    });
    for (;;) {
      const step = steps.next();
      if (step.done) return step.value;
      this.emit('progress', { elapsedSeconds: elapsed(), fraction: step.value.fraction });
      await yieldToEventLoop();
    }
  }

  private finishCanceled(): RenderJobResult {
    this.emit('canceled', undefined);
    return { status: 'canceled' };
  }

  private emit<K extends RenderJobEventType>(event: K, data: RenderJobEvents[K]): void {
    const handlers: RenderJobEventHandler<K>[] = this.listeners[event];
    for (const h of handlers) {
      h(data);
    }
  }
}
