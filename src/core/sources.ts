/**
 * Sources — Streams that produce samples from parameters alone.
 *
 * Oscillators quantize their period to a whole number of samples,
 * round(sampleRate / frequency). The rounding detunes high notes audibly
 * (at 44.1 kHz, 4186 Hz plays as 4009 Hz); that is how these oscillators
 * sound, and nothing compensates for it.
 */

import { DEFAULT_RENDER_CONFIG } from '../config';
import type { RenderConfig } from '../config';
import { cycleLength, requireDuration, requireUnitInterval, roundHalfEven, sampleCount } from './params';
import { SampleStream } from './stream';
import type { FiniteStream, InfiniteStream } from './stream';
import type { Duration, Frequency, Sample } from './types';

/** Repeat one period, computed per index, forever */
function periodic(length: number, shape: (i: number, length: number) => Sample): InfiniteStream {
  function* cycles(): Generator<Sample, void, undefined> {
    for (;;) {
      for (let i = 0; i < length; i++) {
        yield shape(i, length);
      }
    }
  }
  return SampleStream.infinite(cycles());
}

// --- Constants ---

/**
 * A level held forever. Envelope scaffolding: limit it before rendering.
 */
export function hold(level: Sample): InfiniteStream {
  function* constant(): Generator<Sample, void, undefined> {
    for (;;) yield level;
  }
  return SampleStream.infinite(constant());
}

export function silence(): InfiniteStream {
  return hold(0.0);
}

// --- Oscillators ---

/**
 * `max` for the first round(dutyCycle * period) samples of each period,
 * `min` for the rest, ties rounding to even (a 169-sample square wave is 84
 * high, 85 low). A duty cycle of 0 or 1 leaves one phase empty.
 */
export function rectangularWave(
  frequency: Frequency,
  dutyCycle: number,
  min: Sample = 0.0,
  max: Sample = 1.0,
  config: RenderConfig = DEFAULT_RENDER_CONFIG
): InfiniteStream {
  requireUnitInterval('dutyCycle', dutyCycle);
  const length = cycleLength(frequency, config);
  const high = roundHalfEven(dutyCycle * length);
  return periodic(length, (i) => (i < high ? max : min));
}

export function sineWave(
  frequency: Frequency,
  config: RenderConfig = DEFAULT_RENDER_CONFIG
): InfiniteStream {
  const length = cycleLength(frequency, config);
  return periodic(length, (i, n) => Math.sin((2 * Math.PI * i) / n));
}

/** 0 → 1 → -1 → 0, starting at the zero crossing like the sine */
export function triangleWave(
  frequency: Frequency,
  config: RenderConfig = DEFAULT_RENDER_CONFIG
): InfiniteStream {
  const length = cycleLength(frequency, config);
  return periodic(length, (i, n) => {
    const phase = i / n;
    if (phase < 0.25) return 4 * phase;
    if (phase < 0.75) return 2 - 4 * phase;
    return 4 * phase - 4;
  });
}

/** -1 rising toward 1, then back to -1 */
export function sawtoothWave(
  frequency: Frequency,
  config: RenderConfig = DEFAULT_RENDER_CONFIG
): InfiniteStream {
  const length = cycleLength(frequency, config);
  return periodic(length, (i, n) => -1 + (2 * i) / n);
}

// --- Ramps ---

/**
 * round(duration * sampleRate) samples stepping from `start` toward `end`.
 * The first sample is `start`; the last stops one step short of `end`.
 */
export function linearChange(
  duration: Duration,
  start: Sample,
  end: Sample,
  config: RenderConfig = DEFAULT_RENDER_CONFIG
): FiniteStream {
  requireDuration('duration', duration);
  const count = sampleCount(duration, config);

  function* ramp(): Generator<Sample, void, undefined> {
    for (let i = 0; i < count; i++) {
      yield start + (i * (end - start)) / count;
    }
  }

  return SampleStream.finite(ramp());
}
