/**
 * toneloom — Lazy sample streams rendered to PCM WAV files
 *
 * Main entry point. Exports all public API.
 */

// Core primitives
export * from './core';

// File output
export { render, tryRender, quantize } from './audio';
export type { RenderOptions, RenderSummary, RenderResult } from './audio';

// Standard prelude
export { tone, rest, melody, DEFAULT_ENVELOPE, DEFAULT_GAIN } from './prelude';
export type { ToneOptions } from './prelude';

// Configuration
export {
  DEFAULT_RENDER_CONFIG,
  DEFAULT_SAMPLE_RATE,
  DEFAULT_TEMPO,
  CHANNELS,
  BIT_DEPTH,
  PCM_MAX,
  A4_FREQUENCY,
  REFERENCE_OCTAVE,
  MIN_OCTAVE,
  MAX_OCTAVE,
  createRenderConfig,
} from './config';
export type { RenderConfig, RenderConfigOverrides } from './config';
