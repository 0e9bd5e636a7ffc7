/**
 * Error taxonomy for a single admission pass. Each class carries the HTTP code
 * the handler reports back to the API server.
 */

export abstract class AdmissionError extends Error {
  abstract readonly code: number;
}

/** The inbound object is not a structurally valid pod. */
export class DecodeError extends AdmissionError {
  readonly code = 400;

  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'DecodeError';
    Object.setPrototypeOf(this, DecodeError.prototype);
  }
}

/** An annotation asks for something the injector does not offer; the pod is denied. */
export class ValidationError extends AdmissionError {
  readonly code = 403;

  constructor(
    message: string,
    public readonly annotation: string,
    public readonly value: string,
    public readonly invalidTokens: readonly string[],
    public readonly allowed: readonly string[]
  ) {
    super(message);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/** A config renderer was given parameters it cannot encode. Always a defect, never retried. */
export class RenderError extends AdmissionError {
  readonly code = 500;

  constructor(
    message: string,
    public readonly renderer: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'RenderError';
    Object.setPrototypeOf(this, RenderError.prototype);
  }
}

/** The mutated pod could not be serialized. */
export class MarshalError extends AdmissionError {
  readonly code = 500;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'MarshalError';
    Object.setPrototypeOf(this, MarshalError.prototype);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
