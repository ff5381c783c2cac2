/**
 * Envelope — Amplitude shapes to multiply against a tone.
 */

import { DEFAULT_RENDER_CONFIG } from '../config';
import type { RenderConfig } from '../config';
import { requireUnitInterval } from './params';
import { hold, linearChange } from './sources';
import { concatenate, timeLimit } from './stream';
import type { FiniteStream } from './stream';
import type { Duration } from './types';

/**
 * Attack to full level, decay to `sustainLevel`, hold it, release to zero.
 * Each phase is its own ramp, so the length is the sum of the four sample counts.
 */
export function linearAdsr(
  attack: Duration,
  decay: Duration,
  sustain: Duration,
  release: Duration,
  sustainLevel: number,
  config: RenderConfig = DEFAULT_RENDER_CONFIG
): FiniteStream {
  requireUnitInterval('sustainLevel', sustainLevel);
  return concatenate(
    linearChange(attack, 0.0, 1.0, config),
    linearChange(decay, 1.0, sustainLevel, config),
    timeLimit(hold(sustainLevel), sustain, config),
    linearChange(release, sustainLevel, 0.0, config)
  );
}
