import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { quantize, render, tryRender } from '../audio/wav';
import { SampleStream, concatenate, timeLimit } from '../core/stream';
import { hold, linearChange, sineWave } from '../core/sources';
import { EncodingError, QuantizationError, StreamExhaustedError } from '../core/errors';
import { createRenderConfig } from '../config';
import type { FiniteStream } from '../core/stream';

const fromArray = (values: number[]): FiniteStream => SampleStream.finite(values.values());

/** Header fields and frames of a PCM WAV buffer */
function readWav(buf: Buffer) {
  const fmt = buf.indexOf('fmt ');
  const data = buf.indexOf('data');
  const dataSize = buf.readUInt32LE(data + 4);
  const frames: number[] = [];
  for (let offset = data + 8; offset < data + 8 + dataSize; offset += 2) {
    frames.push(buf.readInt16LE(offset));
  }
  return {
    riff: buf.toString('ascii', 0, 4),
    wave: buf.toString('ascii', 8, 12),
    format: buf.readUInt16LE(fmt + 8),
    channels: buf.readUInt16LE(fmt + 10),
    sampleRate: buf.readUInt32LE(fmt + 12),
    bitDepth: buf.readUInt16LE(fmt + 22),
    dataSize,
    frames,
  };
}

describe('quantize', () => {
  it('maps the unit range onto ±32767', () => {
    expect(quantize(1.0, 0)).toBe(32767);
    expect(quantize(-1.0, 0)).toBe(-32767);
    expect(quantize(0.0, 0)).toBe(0);
    expect(quantize(0.25, 0)).toBe(8192);
    expect(quantize(-0.25, 0)).toBe(-8192);
  });

  it('rounds ties to even, symmetrically about zero', () => {
    expect(quantize(2.5 / 32767, 0)).toBe(2);
    expect(quantize(-2.5 / 32767, 0)).toBe(-2);
  });

  it('never yields negative zero', () => {
    expect(Object.is(quantize(-0.00001, 0), 0)).toBe(true);
  });

  it('refuses out-of-range samples instead of clamping', () => {
    expect(() => quantize(1.0001, 7)).toThrow(QuantizationError);
    expect(() => quantize(Number.NaN, 7)).toThrow(QuantizationError);

    let caught: unknown;
    try {
      quantize(-2, 12);
    } catch (err) {
      caught = err;
    }
    expect(caught).toMatchObject({ index: 12, value: -2 });
  });
});

describe('render', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'toneloom-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('writes one second of sine as 44100 mono 16-bit frames', async () => {
    const path = join(dir, 'middle-c.wav');
    const summary = await render(timeLimit(sineWave(261.63), 1.0), path);

    expect(summary).toEqual({
      path,
      frames: 44100,
      sampleRate: 44100,
      channels: 1,
      bitDepth: 16,
      durationSeconds: 1,
    });

    const wav = readWav(await readFile(path));
    expect(wav.riff).toBe('RIFF');
    expect(wav.wave).toBe('WAVE');
    expect(wav.format).toBe(1);
    expect(wav.channels).toBe(1);
    expect(wav.sampleRate).toBe(44100);
    expect(wav.bitDepth).toBe(16);
    expect(wav.dataSize).toBe(88200);
    expect(wav.frames).toHaveLength(44100);
    expect(wav.frames[0]).toBe(0);
  });

  it('stores quantized samples in order', async () => {
    const path = join(dir, 'levels.wav');
    await render(fromArray([0, 0.25, -0.25, 1, -1]), path);
    expect(readWav(await readFile(path)).frames).toEqual([0, 8192, -8192, 32767, -32767]);
  });

  it('leaves only the finished file behind', async () => {
    await render(fromArray([0.1]), join(dir, 'out.wav'));
    expect(await readdir(dir)).toEqual(['out.wav']);
  });

  it('writes the configured sample rate', async () => {
    const path = join(dir, 'low.wav');
    const config = createRenderConfig({ sampleRate: 8000 });
    const summary = await render(timeLimit(sineWave(400, config), 0.5, config), path, { config });
    expect(summary.frames).toBe(4000);
    expect(readWav(await readFile(path)).sampleRate).toBe(8000);
  });

  it('fails on an exhausted source and writes nothing', async () => {
    const path = join(dir, 'short.wav');
    await expect(render(timeLimit(linearChange(1.0, 0, 0.5), 2.0), path)).rejects.toBeInstanceOf(
      StreamExhaustedError
    );
    expect(await readdir(dir)).toEqual([]);
  });

  it('reports exhaustion at the frame index of the whole render', async () => {
    // 44100 held frames, then a 22050-sample ramp limited to 44100
    const stream = concatenate(
      timeLimit(hold(0.1), 1.0),
      timeLimit(linearChange(0.5, 0, 0.5), 1.0)
    );
    const pending = render(stream, join(dir, 'joined.wav'));
    await expect(pending).rejects.toBeInstanceOf(StreamExhaustedError);
    await expect(pending).rejects.toMatchObject({
      index: 66150,
      requested: 44100,
      cause: expect.objectContaining({ index: 22050 }),
    });
    expect(await readdir(dir)).toEqual([]);
  });

  it('renders streams longer than its initial buffer', async () => {
    const path = join(dir, 'long.wav');
    const summary = await render(timeLimit(hold(0.25), 2.0), path);
    expect(summary.frames).toBe(88200);
    const frames = readWav(await readFile(path)).frames;
    expect(frames).toHaveLength(88200);
    expect(frames[65535]).toBe(8192);
    expect(frames[65536]).toBe(8192);
    expect(frames[88199]).toBe(8192);
  });

  it('fails on an out-of-range sample with its index and value', async () => {
    const pending = render(fromArray([0.5, 1.5]), join(dir, 'loud.wav'));
    await expect(pending).rejects.toBeInstanceOf(QuantizationError);
    await expect(pending).rejects.toMatchObject({ index: 1, value: 1.5 });
    expect(await readdir(dir)).toEqual([]);
  });

  it('wraps a failing source in an EncodingError', async () => {
    function* broken(): Generator<number, void, undefined> {
      yield 0.1;
      throw new Error('boom');
    }
    const pending = render(SampleStream.finite(broken()), join(dir, 'broken.wav'));
    await expect(pending).rejects.toBeInstanceOf(EncodingError);
    await expect(pending).rejects.toMatchObject({ index: 1, value: null });
    expect(await readdir(dir)).toEqual([]);
  });

  it('fails when the output cannot be opened', async () => {
    await expect(render(fromArray([0]), join(dir, 'missing', 'x.wav'))).rejects.toBeInstanceOf(EncodingError);
  });

  it('logs a summary when verbose', async () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const path = join(dir, 'loud.wav');
    await render(fromArray([0, 0, 0, 0, 0]), path, { verbose: true });
    expect(info).toHaveBeenCalledWith(`[toneloom] Wrote 5 frames (0.00s) to ${path}`);
  });
});

describe('tryRender', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'toneloom-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns the summary on success', async () => {
    const result = await tryRender(fromArray([0, 0.5]), join(dir, 'ok.wav'));
    expect(result.success).toBe(true);
    if (result.success) expect(result.summary.frames).toBe(2);
  });

  it('returns the error on failure', async () => {
    const result = await tryRender(fromArray([2]), join(dir, 'bad.wav'));
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error).toBeInstanceOf(QuantizationError);
    expect(await readdir(dir)).toEqual([]);
  });
});
