/**
 * Core — Pure logic primitives for toneloom.
 *
 * This module contains the mathematical core: sample streams, their sources
 * and transforms, envelopes, and pitch resolution.
 * No side effects, no files — just lazy streams.
 */

export { SampleStream, timeLimit, scale, concatenate } from './stream';
export type { FiniteStream, InfiniteStream } from './stream';

export {
  hold,
  silence,
  rectangularWave,
  sineWave,
  triangleWave,
  sawtoothWave,
  linearChange,
} from './sources';

export { linearAdsr } from './envelope';

export {
  parseNoteName,
  resolveFrequency,
  resolveDuration,
  semitoneOffset,
  durationRatio,
  isNoteDurationKind,
} from './pitch';

export {
  SynthError,
  MalformedNoteError,
  InvalidParameterError,
  StreamExhaustedError,
  QuantizationError,
  EncodingError,
} from './errors';

export { PITCH_CLASSES, NOTE_DURATION_KINDS } from './types';
export type {
  Sample,
  Frequency,
  Duration,
  Extent,
  PitchClass,
  ParsedNote,
  NoteDurationKind,
  Waveform,
  EnvelopeShape,
  MelodyEvent,
} from './types';
