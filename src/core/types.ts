/**
 * Core Types — Shared type definitions for toneloom.
 *
 * This file contains interfaces and types used across multiple modules.
 * Keeping them separate prevents circular dependencies.
 */

// --- Sample Types ---

/** One amplitude value, nominally in [-1, 1] */
export type Sample = number;

/** Frequency in Hz */
export type Frequency = number;

/** Duration in seconds */
export type Duration = number;

/** Whether a stream ever ends */
export type Extent = 'finite' | 'infinite';

// --- Pitch Types ---

export const PITCH_CLASSES = [
  'C', 'C#', 'Db', 'D', 'D#', 'Eb', 'E', 'F',
  'F#', 'Gb', 'G', 'G#', 'Ab', 'A', 'A#', 'Bb', 'B',
] as const;

/** A pitch spelling, enharmonics included */
export type PitchClass = (typeof PITCH_CLASSES)[number];

/** Parsed form of a note name such as "C#5" */
export interface ParsedNote {
  pitchClass: PitchClass;
  octave: number;
}

export const NOTE_DURATION_KINDS = [
  'whole',
  'dottedWhole',
  'half',
  'dottedHalf',
  'quarter',
  'dottedQuarter',
  'eighth',
  'dottedEighth',
  'sixteenth',
  'dottedSixteenth',
  'thirtySecond',
  'dottedThirtySecond',
] as const;

export type NoteDurationKind = (typeof NOTE_DURATION_KINDS)[number];

// --- Prelude Types ---

export type Waveform = 'sine' | 'square' | 'triangle' | 'sawtooth';

/** Fixed envelope phases in seconds; sustain fills whatever is left */
export interface EnvelopeShape {
  attack: Duration;
  decay: Duration;
  release: Duration;
  sustainLevel: number;
}

/** A note name, or null for a rest, held for a duration kind */
export type MelodyEvent = readonly [note: string | null, kind: NoteDurationKind];
