/**
 * WAV — Pulls a finite stream to the end and writes it as 16-bit mono PCM.
 *
 * The container is written to a sibling `.partial` file and renamed into
 * place only once every sample has been quantized and the handle closed.
 * A failed render removes the partial file and rethrows; no output appears.
 */

import { open, rename, rm } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import wavefile from 'wavefile';
import { DEFAULT_RENDER_CONFIG, LOG_PREFIX, PCM_MAX } from '../config';
import type { RenderConfig } from '../config';
import {
  EncodingError,
  InvalidParameterError,
  QuantizationError,
  StreamExhaustedError,
  SynthError,
} from '../core/errors';
import { roundHalfEven } from '../core/params';
import type { FiniteStream } from '../core/stream';
import type { Sample } from '../core/types';

const { WaveFile } = wavefile;

/** Frames allocated up front; doubled whenever they fill */
const INITIAL_FRAME_CAPACITY = 1 << 16;

export interface RenderOptions {
  config?: RenderConfig;
  /** Log a one-line summary once the file is in place */
  verbose?: boolean;
}

export interface RenderSummary {
  path: string;
  frames: number;
  sampleRate: number;
  channels: number;
  bitDepth: number;
  durationSeconds: number;
}

export type RenderResult =
  | { success: true; summary: RenderSummary }
  | { success: false; error: SynthError };

/** round(32767 * sample), ties to even. Out-of-range input is an error, never clamped. */
export function quantize(sample: Sample, index: number): number {
  if (!(sample >= -1 && sample <= 1)) {
    throw new QuantizationError(index, sample);
  }
  // rounding -0.4 gives -0; store a plain zero
  return roundHalfEven(PCM_MAX * sample) || 0;
}

/**
 * Drain the stream into quantized frames, doubling the buffer as it fills.
 * Errors carry the frame index within the render, not within a sub-stream.
 */
function pullFrames(stream: FiniteStream): Int16Array {
  let frames = new Int16Array(INITIAL_FRAME_CAPACITY);

  for (let index = 0; ; index++) {
    let result: IteratorResult<Sample, undefined>;
    try {
      result = stream.next();
    } catch (err) {
      if (err instanceof StreamExhaustedError) {
        throw new StreamExhaustedError(index, err.requested, { cause: err });
      }
      if (err instanceof SynthError) throw err;
      throw new EncodingError('Source stream failed', index, null, err);
    }
    if (result.done) return frames.subarray(0, index);

    if (index === frames.length) {
      const grown = new Int16Array(frames.length * 2);
      grown.set(frames);
      frames = grown;
    }
    frames[index] = quantize(result.value, index);
  }
}

function encode(frames: Int16Array, config: RenderConfig): Uint8Array {
  try {
    const wav = new WaveFile();
    wav.fromScratch(config.channels, config.sampleRate, String(config.bitDepth), frames);
    return wav.toBuffer();
  } catch (err) {
    throw new EncodingError('Failed to encode WAV container', null, null, err);
  }
}

async function discard(tempPath: string): Promise<void> {
  try {
    await rm(tempPath, { force: true });
  } catch (err) {
    console.warn(`${LOG_PREFIX} Could not remove ${tempPath}:`, err);
  }
}

async function openOutput(tempPath: string): Promise<FileHandle> {
  try {
    return await open(tempPath, 'w');
  } catch (err) {
    throw new EncodingError(`Cannot open ${tempPath}`, null, null, err);
  }
}

/** Quantize, encode and write; the handle is closed on every path */
async function writeContainer(stream: FiniteStream, tempPath: string, config: RenderConfig): Promise<number> {
  const handle = await openOutput(tempPath);
  try {
    const pcm = pullFrames(stream);
    const bytes = encode(pcm, config);
    try {
      await handle.writeFile(bytes);
    } catch (err) {
      throw new EncodingError(`Failed to write ${tempPath}`, null, null, err);
    }
    return pcm.length;
  } finally {
    await handle.close();
  }
}

/**
 * Render a finite stream to `outputPath`.
 * Rejects with the first error met; the target path is left untouched.
 */
export async function render(
  stream: FiniteStream,
  outputPath: string,
  options: RenderOptions = {}
): Promise<RenderSummary> {
  const config = options.config ?? DEFAULT_RENDER_CONFIG;

  if (stream.extent !== 'finite') {
    throw new InvalidParameterError('stream', stream.extent, 'only finite streams can be rendered; limit it first');
  }

  const tempPath = `${outputPath}.partial`;
  let frames: number;
  try {
    frames = await writeContainer(stream, tempPath, config);
    await rename(tempPath, outputPath);
  } catch (err) {
    await discard(tempPath);
    if (err instanceof SynthError) throw err;
    throw new EncodingError(`Failed to finalize ${outputPath}`, null, null, err);
  }

  const summary: RenderSummary = {
    path: outputPath,
    frames,
    sampleRate: config.sampleRate,
    channels: config.channels,
    bitDepth: config.bitDepth,
    durationSeconds: frames / config.sampleRate,
  };

  if (options.verbose) {
    console.info(
      `${LOG_PREFIX} Wrote ${summary.frames} frames (${summary.durationSeconds.toFixed(2)}s) to ${outputPath}`
    );
  }

  return summary;
}

/** `render`, with failures returned instead of thrown */
export async function tryRender(
  stream: FiniteStream,
  outputPath: string,
  options: RenderOptions = {}
): Promise<RenderResult> {
  try {
    const summary = await render(stream, outputPath, options);
    return { success: true, summary };
  } catch (err) {
    if (err instanceof SynthError) return { success: false, error: err };
    throw err;
  }
}
