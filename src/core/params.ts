/**
 * Parameter checks shared by the stream constructors.
 * All of them throw InvalidParameterError eagerly.
 */

import { InvalidParameterError } from './errors';
import type { RenderConfig } from '../config';

export function requireDuration(name: string, seconds: number): number {
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidParameterError(name, seconds, 'must be a positive number of seconds');
  }
  return seconds;
}

export function requireUnitInterval(name: string, value: number): number {
  if (!(value >= 0 && value <= 1)) {
    throw new InvalidParameterError(name, value, 'must lie in [0, 1]');
  }
  return value;
}

/**
 * Nearest integer, ties to the even neighbour: 2.5 -> 2, -2.5 -> -2, 3.5 -> 4.
 * Unlike Math.round this is symmetric about zero.
 */
export function roundHalfEven(x: number): number {
  const floor = Math.floor(x);
  const diff = x - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/** Whole samples in one period; rejects pitches too high to hold a single sample */
export function cycleLength(frequency: number, config: RenderConfig): number {
  if (!Number.isFinite(frequency) || frequency <= 0) {
    throw new InvalidParameterError('frequency', frequency, 'must be a positive number of Hz');
  }
  const samples = roundHalfEven(config.sampleRate / frequency);
  if (samples === 0) {
    throw new InvalidParameterError('frequency', frequency, `a period rounds to zero samples at ${config.sampleRate} Hz`);
  }
  return samples;
}

/** Whole samples spanned by a duration */
export function sampleCount(seconds: number, config: RenderConfig): number {
  return roundHalfEven(seconds * config.sampleRate);
}
