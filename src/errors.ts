export type PipelineErrorCode =
  | 'UPSTREAM_FORMAT'
  | 'UPSTREAM_CONTENT'
  | 'GENERATION_FAILED'
  | 'NOTATION_PARSE'
  | 'EMPTY_PART'
  | 'NO_VALID_PARTS';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Structured response could not be decoded; callers substitute defaults. */
export class UpstreamFormatError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('UPSTREAM_FORMAT', message, options);
  }
}

/** The service answered in prose instead of notation. */
export class UpstreamContentError extends PipelineError {
  readonly marker: string;

  constructor(marker: string) {
    super('UPSTREAM_CONTENT', `Response contains conversational text ("${marker}")`);
    this.marker = marker;
  }
}

export class GenerationError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('GENERATION_FAILED', message, options);
  }
}

export class NotationParseError extends PipelineError {
  readonly line: number;
  readonly column: number;

  constructor(message: string, line: number, column: number) {
    super('NOTATION_PARSE', `${message} (line ${line}, col ${column})`);
    this.line = line;
    this.column = column;
  }
}

export class EmptyPartError extends PipelineError {
  constructor(instrument: string) {
    super('EMPTY_PART', `Part for ${instrument} contains no playable events`);
  }
}

export class NoValidPartsError extends PipelineError {
  readonly attempted: number;

  constructor(attempted: number) {
    super('NO_VALID_PARTS', `No valid parts were generated (${attempted} attempted)`);
    this.attempted = attempted;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type Result<T, E = PipelineError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
