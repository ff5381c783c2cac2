/**
 * Configuration — Centralized constants for toneloom.
 *
 * All magic numbers live here for visibility, documentation, and testing.
 */

import { InvalidParameterError } from './core/errors';

// --- Rendering ---

/** Output sample rate (Hz) */
export const DEFAULT_SAMPLE_RATE = 44100;

/** Mono output only */
export const CHANNELS = 1;

/** Signed 16-bit PCM */
export const BIT_DEPTH = 16;

/** Largest magnitude a quantized sample may take */
export const PCM_MAX = 32767;

// --- Timing ---

/** Default tempo in quarter notes per minute */
export const DEFAULT_TEMPO = 120;

// --- Pitch ---

/** Concert A (Hz) */
export const A4_FREQUENCY = 440;

/** Octave assumed when a note name omits one */
export const REFERENCE_OCTAVE = 4;

/** Lowest and highest octave a note name may carry (A-1 = 13.75 Hz, C10 ≈ 16.7 kHz) */
export const MIN_OCTAVE = -1;
export const MAX_OCTAVE = 10;

// --- Logging ---

export const LOG_PREFIX = '[toneloom]';

// --- Render Config ---

/** Process-wide render settings. Created once, never mutated. */
export interface RenderConfig {
  readonly sampleRate: number;
  readonly channels: typeof CHANNELS;
  readonly bitDepth: typeof BIT_DEPTH;
  readonly tempo: number;
}

export type RenderConfigOverrides = Partial<Pick<RenderConfig, 'sampleRate' | 'tempo'>>;

function freezeConfig(config: RenderConfig): RenderConfig {
  return Object.freeze(config);
}

export const DEFAULT_RENDER_CONFIG = freezeConfig({
  sampleRate: DEFAULT_SAMPLE_RATE,
  channels: CHANNELS,
  bitDepth: BIT_DEPTH,
  tempo: DEFAULT_TEMPO,
});

/** Build a frozen config, validating the overridable fields */
export function createRenderConfig(overrides: RenderConfigOverrides = {}): RenderConfig {
  const sampleRate = overrides.sampleRate ?? DEFAULT_SAMPLE_RATE;
  const tempo = overrides.tempo ?? DEFAULT_TEMPO;

  if (!Number.isInteger(sampleRate) || sampleRate <= 0) {
    throw new InvalidParameterError('sampleRate', sampleRate, 'must be a positive integer');
  }
  if (!Number.isFinite(tempo) || tempo <= 0) {
    throw new InvalidParameterError('tempo', tempo, 'must be a positive number');
  }

  return freezeConfig({
    sampleRate,
    channels: CHANNELS,
    bitDepth: BIT_DEPTH,
    tempo,
  });
}
