export type PipelineErrorKind =
  | 'timeout'
  | 'validation'
  | 'security'
  | 'tool_error';

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(kind: PipelineErrorKind, code: string, message: string, opts?: { details?: Record<string, unknown>; cause?: unknown }) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'PipelineError';
    this.kind = kind;
    this.code = code;
    if (opts?.details !== undefined) {
      this.details = opts.details;
    }
  }

  /** Value stored in `ToolExecutionResult.errorType`. */
  get errorType(): string {
    return this.kind;
  }
}

export class TimeoutError extends PipelineError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super('timeout', 'TIMEOUT', message, { details: { timeoutMs } });
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class ValidationError extends PipelineError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('validation', 'VALIDATION', message, issues.length > 0 ? { details: { issues } } : undefined);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class SecurityError extends PipelineError {
  constructor(message: string) {
    super('security', 'SECURITY', message);
    this.name = 'SecurityError';
  }
}

/** The tool body threw; `errorType` carries the thrown error's own name. */
export class ToolError extends PipelineError {
  readonly originalName: string;

  constructor(message: string, originalName: string, cause?: unknown) {
    super('tool_error', 'TOOL_ERROR', message, { cause });
    this.name = 'ToolError';
    this.originalName = originalName;
  }

  override get errorType(): string {
    return this.originalName;
  }
}

export const isPipelineError = (value: unknown): value is PipelineError =>
  value instanceof PipelineError;

const normalizeErrorMessage = (value: unknown): string => {
  if (value instanceof Error && typeof value.message === 'string') return value.message;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return value.toString();
  }
  if (value === null) return 'null';
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value);
    } catch {
      return '[unserializable-error]';
    }
  }
  return 'unknown_error';
};

const normalizeErrorName = (value: unknown): string => {
  if (value instanceof Error && typeof value.name === 'string' && value.name.length > 0) return value.name;
  return 'Error';
};

export const toPipelineError = (value: unknown): PipelineError => {
  if (isPipelineError(value)) return value;
  return new ToolError(normalizeErrorMessage(value), normalizeErrorName(value), value);
};
