/**
 * Standard Prelude — Composer-friendly helpers built on streams.
 *
 * These translate "play C4 for a quarter note" into stream math.
 * Nothing here is special: each helper is a few calls into core.
 */

import { DEFAULT_RENDER_CONFIG } from './config';
import type { RenderConfig } from './config';
import { linearAdsr } from './core/envelope';
import { InvalidParameterError } from './core/errors';
import { requireUnitInterval, sampleCount } from './core/params';
import { resolveDuration, resolveFrequency } from './core/pitch';
import { hold, rectangularWave, sawtoothWave, silence, sineWave, triangleWave } from './core/sources';
import { concatenate, scale, timeLimit } from './core/stream';
import type { FiniteStream, InfiniteStream } from './core/stream';
import type { EnvelopeShape, Frequency, MelodyEvent, NoteDurationKind, Waveform } from './core/types';

export const DEFAULT_ENVELOPE: EnvelopeShape = Object.freeze({
  attack: 0.01,
  decay: 0.05,
  release: 0.05,
  sustainLevel: 0.7,
});

export const DEFAULT_GAIN = 0.8;

export interface ToneOptions {
  waveform?: Waveform;
  gain?: number;
  envelope?: Partial<EnvelopeShape>;
  config?: RenderConfig;
}

function oscillator(waveform: Waveform, frequency: Frequency, config: RenderConfig): InfiniteStream {
  switch (waveform) {
    case 'sine':
      return sineWave(frequency, config);
    case 'square':
      return rectangularWave(frequency, 0.5, -1.0, 1.0, config);
    case 'triangle':
      return triangleWave(frequency, config);
    case 'sawtooth':
      return sawtoothWave(frequency, config);
  }
}

/**
 * One enveloped note spanning the duration of `kind` at the config tempo.
 * Sustain fills whatever attack, decay and release leave.
 */
export function tone(noteName: string, kind: NoteDurationKind, options: ToneOptions = {}): FiniteStream {
  const config = options.config ?? DEFAULT_RENDER_CONFIG;
  const gain = requireUnitInterval('gain', options.gain ?? DEFAULT_GAIN);
  const shape: EnvelopeShape = { ...DEFAULT_ENVELOPE, ...options.envelope };

  const frequency = resolveFrequency(noteName);
  const duration = resolveDuration(kind, config.tempo);
  const sustain = duration - shape.attack - shape.decay - shape.release;

  if (sampleCount(sustain, config) <= 0) {
    throw new InvalidParameterError(
      'envelope',
      `${shape.attack}+${shape.decay}+${shape.release}s`,
      `leaves no sustain within a ${kind} note (${duration}s)`
    );
  }

  const envelope = linearAdsr(shape.attack, shape.decay, sustain, shape.release, shape.sustainLevel, config);
  return scale(scale(oscillator(options.waveform ?? 'sine', frequency, config), hold(gain)), envelope);
}

/** Silence for the duration of `kind` */
export function rest(kind: NoteDurationKind, config: RenderConfig = DEFAULT_RENDER_CONFIG): FiniteStream {
  return timeLimit(silence(), resolveDuration(kind, config.tempo), config);
}

/** Notes and rests back to back. A null note is a rest. */
export function melody(events: readonly MelodyEvent[], options: ToneOptions = {}): FiniteStream {
  const config = options.config ?? DEFAULT_RENDER_CONFIG;
  return concatenate(
    ...events.map(([note, kind]) => (note === null ? rest(kind, config) : tone(note, kind, options)))
  );
}
