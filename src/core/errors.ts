/**
 * Errors — Everything toneloom throws.
 *
 * Parameter errors are raised when a stream is built. Exhaustion, quantization
 * and encoding errors are raised while a stream is being pulled or written.
 */

export class SynthError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Note token does not parse or names an unknown pitch class */
export class MalformedNoteError extends SynthError {
  readonly token: string;

  constructor(token: string, reason: string) {
    super(`Malformed note "${token}": ${reason}`);
    this.token = token;
  }
}

/** A constructor argument lies outside its valid domain */
export class InvalidParameterError extends SynthError {
  readonly parameter: string;
  readonly value: unknown;

  constructor(parameter: string, value: unknown, reason: string) {
    super(`Invalid ${parameter} (${String(value)}): ${reason}`);
    this.parameter = parameter;
    this.value = value;
  }
}

/** A transform asked a finite source for more samples than it had */
export class StreamExhaustedError extends SynthError {
  readonly index: number;
  readonly requested: number;

  constructor(index: number, requested: number, options?: ErrorOptions) {
    super(`Source stream ended at sample ${index}; a limit of ${requested} samples was requested`, options);
    this.index = index;
    this.requested = requested;
  }
}

/** A sample could not be mapped onto a 16-bit integer */
export class QuantizationError extends SynthError {
  readonly index: number;
  readonly value: number;

  constructor(index: number, value: number) {
    super(`Cannot quantize sample ${index} (${value}): outside [-1, 1]`);
    this.index = index;
    this.value = value;
  }
}

/** Writing the container failed */
export class EncodingError extends SynthError {
  readonly index: number | null;
  readonly value: number | null;

  constructor(message: string, index: number | null, value: number | null, cause: unknown) {
    const at = index === null ? '' : ` at sample ${index} (${String(value)})`;
    super(`${message}${at}`, { cause });
    this.index = index;
    this.value = value;
  }
}
