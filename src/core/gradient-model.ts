import type { Rgb } from '../types';
import { ConfigurationError } from './errors';
import { hexToRgb } from './color';

export interface GradientStop {
  /** 0..1 along the gradient axis */
  position: number;
  color: Rgb;
  opacity: number;
}

export interface GradientConfig {
  /** Sorted by position, ascending */
  stops: GradientStop[];
  angleDeg: number;
}

export const MIN_STOPS = 2;
export const MAX_STOPS = 6;

export function createDefaultGradient(): GradientConfig {
  return {
    angleDeg: 20,
    stops: [
      { position: 0.0, color: hexToRgb('#000814'), opacity: 1 },
      { position: 0.3, color: hexToRgb('#0a1628'), opacity: 1 },
      { position: 0.6, color: hexToRgb('#1a2e45'), opacity: 1 },
      { position: 1.0, color: hexToRgb('#caf0f8'), opacity: 1 },
    ],
  };
}

// Array.prototype.sort is stable, so equal positions keep their list order.
export function sortStops(stops: GradientStop[]): GradientStop[] {
  return [...stops].sort((a, b) => a.position - b.position);
}

function copyStop(stop: GradientStop): GradientStop {
  return { position: stop.position, color: [...stop.color], opacity: stop.opacity };
}

/**
 * Editable gradient whose stops stay sorted after every mutation.
 * A stop added at an occupied position lands after the existing ones.
 */
export class GradientModel {
  private stops: GradientStop[];
  angleDeg: number;

  constructor(config: GradientConfig = createDefaultGradient()) {
    this.stops = sortStops(config.stops.map(copyStop));
    this.angleDeg = config.angleDeg;
  }

  get count(): number {
    return this.stops.length;
  }

  getStops(): readonly GradientStop[] {
    return this.stops.map(copyStop);
  }

  add(stop: GradientStop): number {
    if (this.stops.length >= MAX_STOPS) {
      throw ConfigurationError.single('gradient.stops', `at most ${MAX_STOPS} stops are allowed`);
    }
    const added = copyStop(stop);
    this.stops = sortStops([...this.stops, added]);
    return this.stops.indexOf(added);
  }

  update(index: number, patch: Partial<GradientStop>): number {
    const current = this.stops[index];
    if (!current) {
      throw ConfigurationError.single(`gradient.stops[${index}]`, 'no stop at this index');
    }
    const updated: GradientStop = {
      position: patch.position ?? current.position,
      color: patch.color ? [...patch.color] : current.color,
      opacity: patch.opacity ?? current.opacity,
    };
    const next = [...this.stops];
    next[index] = updated;
    this.stops = sortStops(next);
    return this.stops.indexOf(updated);
  }

  remove(index: number): void {
    if (!this.stops[index]) {
      throw ConfigurationError.single(`gradient.stops[${index}]`, 'no stop at this index');
    }
    if (this.stops.length <= MIN_STOPS) {
      throw ConfigurationError.single('gradient.stops', `at least ${MIN_STOPS} stops are required`);
    }
    this.stops.splice(index, 1);
  }

  setAngle(angleDeg: number): void {
    // Wrap into [0, 360)
    this.angleDeg = ((angleDeg % 360) + 360) % 360;
  }

  toConfig(): GradientConfig {
    return { stops: this.stops.map(copyStop), angleDeg: this.angleDeg };
  }
}
