// ═══════════════════════════════════════════════════════════════════════
//  Comparable Sales Engine: Error Taxonomy
//  ValidationError / UnrecognizedValueError exclude one comparable;
//  ConfigurationError / InsufficientDataError abort the run.
// ═══════════════════════════════════════════════════════════════════════

export class ValidationError extends Error {
  public readonly field: string | null;

  constructor(message: string, field: string | null = null) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
  }
}

export class UnrecognizedValueError extends Error {
  public readonly field: string;
  public readonly value: string;
  public readonly scale: readonly string[];

  constructor(field: string, value: string, scale: readonly string[]) {
    super(`Unrecognized value "${value}" for ${field}. Expected one of: ${scale.join(', ')}`);
    this.name = 'UnrecognizedValueError';
    this.field = field;
    this.value = value;
    this.scale = scale;
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class InsufficientDataError extends Error {
  public readonly evaluated: number;

  constructor(evaluated: number) {
    super(
      `No comparable carries weight after validation ` +
      `(${evaluated} evaluated). Cannot reconcile a value.`,
    );
    this.name = 'InsufficientDataError';
    this.evaluated = evaluated;
  }
}

/** Errors that remove a single comparable from the run instead of aborting it. */
export type ComparableLevelError = ValidationError | UnrecognizedValueError;

export function isComparableLevelError(err: unknown): err is ComparableLevelError {
  return err instanceof ValidationError || err instanceof UnrecognizedValueError;
}
