/**
 * Stream — A lazy, single-pass sequence of samples.
 *
 * Nothing is computed until a consumer pulls. Pulling advances the stream for
 * good; to hear something twice, build it twice. Every stream is marked finite
 * or infinite so that only bounded streams reach the renderer.
 */

import { DEFAULT_RENDER_CONFIG } from '../config';
import type { RenderConfig } from '../config';
import { StreamExhaustedError } from './errors';
import { requireDuration, sampleCount } from './params';
import type { Duration, Extent, Sample } from './types';

export type FiniteStream = SampleStream<'finite'>;
export type InfiniteStream = SampleStream<'infinite'>;

export class SampleStream<E extends Extent = Extent> implements IterableIterator<Sample> {
  readonly extent: E;
  private _source: Iterator<Sample>;
  private _position = 0;
  private _done = false;

  constructor(source: Iterator<Sample>, extent: E) {
    this._source = source;
    this.extent = extent;
  }

  static finite(source: Iterator<Sample>): FiniteStream {
    return new SampleStream(source, 'finite');
  }

  static infinite(source: Iterator<Sample>): InfiniteStream {
    return new SampleStream(source, 'infinite');
  }

  /** Samples pulled so far */
  get position(): number {
    return this._position;
  }

  get done(): boolean {
    return this._done;
  }

  /** Pull the next sample */
  next(): IteratorResult<Sample, undefined> {
    if (this._done) return { done: true, value: undefined };

    const result = this._source.next();
    if (result.done) {
      this._done = true;
      return { done: true, value: undefined };
    }
    this._position++;
    return { done: false, value: result.value };
  }

  [Symbol.iterator](): this {
    return this;
  }

  /** Pull up to n samples */
  take(n: number): Sample[] {
    const out: Sample[] = [];
    while (out.length < n) {
      const result = this.next();
      if (result.done) break;
      out.push(result.value);
    }
    return out;
  }

  /** Drain a finite stream */
  toArray(this: FiniteStream): Sample[] {
    return Array.from(this);
  }

  // --- Transforms (fluent API) ---

  limit(numSeconds: Duration, config: RenderConfig = DEFAULT_RENDER_CONFIG): FiniteStream {
    return timeLimit(this, numSeconds, config);
  }

  mul(this: FiniteStream, other: SampleStream): FiniteStream;
  mul(other: FiniteStream): FiniteStream;
  mul(this: InfiniteStream, other: InfiniteStream): InfiniteStream;
  mul(other: SampleStream): SampleStream;
  mul(other: SampleStream): SampleStream {
    return scale(this, other);
  }

  followedBy(this: FiniteStream, ...others: FiniteStream[]): FiniteStream;
  followedBy(...others: SampleStream[]): SampleStream;
  followedBy(...others: SampleStream[]): SampleStream {
    return concatenate(this, ...others);
  }
}

// --- Transforms ---

/**
 * Exactly round(numSeconds * sampleRate) samples from `stream`.
 * Throws StreamExhaustedError at pull time if the source runs dry first.
 */
export function timeLimit(
  stream: SampleStream,
  numSeconds: Duration,
  config: RenderConfig = DEFAULT_RENDER_CONFIG
): FiniteStream {
  requireDuration('numSeconds', numSeconds);
  const requested = sampleCount(numSeconds, config);

  function* limited(): Generator<Sample, void, undefined> {
    for (let i = 0; i < requested; i++) {
      const result = stream.next();
      if (result.done) throw new StreamExhaustedError(i, requested);
      yield result.value;
    }
  }

  return SampleStream.finite(limited());
}

/** Elementwise product, ending with the shorter operand */
export function scale(a: FiniteStream, b: SampleStream): FiniteStream;
export function scale(a: SampleStream, b: FiniteStream): FiniteStream;
export function scale(a: InfiniteStream, b: InfiniteStream): InfiniteStream;
export function scale(a: SampleStream, b: SampleStream): SampleStream;
export function scale(a: SampleStream, b: SampleStream): SampleStream {
  const extent: Extent = a.extent === 'finite' || b.extent === 'finite' ? 'finite' : 'infinite';

  function* product(): Generator<Sample, void, undefined> {
    for (;;) {
      const x = a.next();
      if (x.done) return;
      const y = b.next();
      if (y.done) return;
      yield x.value * y.value;
    }
  }

  return new SampleStream(product(), extent);
}

/** Each stream in turn. An infinite operand is never left. */
export function concatenate(...streams: FiniteStream[]): FiniteStream;
export function concatenate(...streams: SampleStream[]): SampleStream;
export function concatenate(...streams: SampleStream[]): SampleStream {
  const extent: Extent = streams.every((s) => s.extent === 'finite') ? 'finite' : 'infinite';

  function* chained(): Generator<Sample, void, undefined> {
    for (const stream of streams) {
      yield* stream;
    }
  }

  return new SampleStream(chained(), extent);
}
