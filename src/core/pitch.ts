/**
 * Pitch — Note names and duration kinds to Hz and seconds.
 */

import { A4_FREQUENCY, MAX_OCTAVE, MIN_OCTAVE, REFERENCE_OCTAVE } from '../config';
import { InvalidParameterError, MalformedNoteError } from './errors';
import { NOTE_DURATION_KINDS, PITCH_CLASSES } from './types';
import type { Duration, Frequency, NoteDurationKind, ParsedNote, PitchClass } from './types';

/** Semitones from A in the same octave */
const SEMITONE_OFFSETS: Record<PitchClass, number> = {
  C: -9,
  'C#': -8,
  Db: -8,
  D: -7,
  'D#': -6,
  Eb: -6,
  E: -5,
  F: -4,
  'F#': -3,
  Gb: -3,
  G: -2,
  'G#': -1,
  Ab: -1,
  A: 0,
  'A#': 1,
  Bb: 1,
  B: 2,
};

/** Multiples of a quarter note */
const DURATION_RATIOS: Record<NoteDurationKind, number> = {
  whole: 4.0,
  dottedWhole: 6.0,
  half: 2.0,
  dottedHalf: 3.0,
  quarter: 1.0,
  dottedQuarter: 1.5,
  eighth: 0.5,
  dottedEighth: 0.75,
  sixteenth: 0.25,
  dottedSixteenth: 0.375,
  thirtySecond: 0.125,
  dottedThirtySecond: 0.1875,
};

const LETTERS = 'ABCDEFG';

function isPitchClass(token: string): token is PitchClass {
  return PITCH_CLASSES.some((pc) => pc === token);
}

export function isNoteDurationKind(kind: string): kind is NoteDurationKind {
  return NOTE_DURATION_KINDS.some((k) => k === kind);
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

/**
 * Split "C#5" into its pitch class and octave.
 * Grammar: letter A-G, optional '#' or 'b', optional (signed) integer octave
 * between MIN_OCTAVE and MAX_OCTAVE.
 */
export function parseNoteName(name: string): ParsedNote {
  let pos = 0;

  const letter = name.charAt(pos);
  if (letter === '' || !LETTERS.includes(letter)) {
    throw new MalformedNoteError(name, 'expected a letter A-G');
  }
  pos++;

  let token = letter;
  const accidental = name.charAt(pos);
  if (accidental === '#' || accidental === 'b') {
    token += accidental;
    pos++;
  }

  let octave = REFERENCE_OCTAVE;
  if (pos < name.length) {
    const digitsStart = name.charAt(pos) === '-' ? pos + 1 : pos;
    if (digitsStart >= name.length) {
      throw new MalformedNoteError(name, 'expected an octave number');
    }
    for (let i = digitsStart; i < name.length; i++) {
      if (!isDigit(name.charAt(i))) {
        throw new MalformedNoteError(name, `unexpected "${name.charAt(i)}"`);
      }
    }
    octave = Number.parseInt(name.slice(pos), 10);
    if (octave < MIN_OCTAVE || octave > MAX_OCTAVE) {
      throw new MalformedNoteError(name, `octave must lie in ${MIN_OCTAVE}..${MAX_OCTAVE}`);
    }
  }

  if (!isPitchClass(token)) {
    throw new MalformedNoteError(name, `unknown pitch class "${token}"`);
  }

  return { pitchClass: token, octave };
}

export function semitoneOffset(pitchClass: PitchClass): number {
  return SEMITONE_OFFSETS[pitchClass];
}

/** Equal-tempered frequency relative to A4 = 440 Hz */
export function resolveFrequency(noteName: string): Frequency {
  const { pitchClass, octave } = parseNoteName(noteName);
  return (
    A4_FREQUENCY *
    Math.pow(2, semitoneOffset(pitchClass) / 12) *
    Math.pow(2, octave - REFERENCE_OCTAVE)
  );
}

export function durationRatio(kind: NoteDurationKind): number {
  return DURATION_RATIOS[kind];
}

/** Seconds for a duration kind at `tempo` quarter notes per minute */
export function resolveDuration(kind: string, tempo: number): Duration {
  if (!isNoteDurationKind(kind)) {
    throw new InvalidParameterError('kind', kind, 'not a note duration kind');
  }
  if (!Number.isFinite(tempo) || tempo <= 0) {
    throw new InvalidParameterError('tempo', tempo, 'must be a positive number');
  }
  return (durationRatio(kind) * 60.0) / tempo;
}
