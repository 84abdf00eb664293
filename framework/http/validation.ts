/**
 * Request Parameter Validation
 *
 * Reads required scalar parameters from merged request input. Every
 * problem is collected so one 422 response lists all offending fields.
 */

export type FieldErrors = Record<string, string[]>;

/**
 * Raised for malformed request input
 */
export class ValidationError extends Error {
  readonly fields: FieldErrors;

  constructor(fields: FieldErrors, message = 'Validation failed') {
    super(message);
    this.name = 'ValidationError';
    this.fields = fields;
  }
}

const INTEGER_PATTERN = /^-?\d+$/;

/**
 * Typed reader over request input
 */
export class ParamReader {
  private errors: FieldErrors = {};

  constructor(private readonly input: Record<string, string>) {}

  /**
   * Read a required, non-empty string
   */
  string(field: string): string {
    const value = this.input[field];
    if (value === undefined || value.trim() === '') {
      this.fail(field, 'Field required');
      return '';
    }
    return value;
  }

  /**
   * Read a required integer
   */
  integer(field: string): number {
    const value = this.input[field];
    if (value === undefined || value.trim() === '') {
      this.fail(field, 'Field required');
      return 0;
    }

    const trimmed = value.trim();
    const parsed = Number(trimmed);
    if (!INTEGER_PATTERN.test(trimmed) || !Number.isSafeInteger(parsed)) {
      this.fail(field, 'Input should be a valid integer');
      return 0;
    }
    return parsed;
  }

  /**
   * Whether every read so far succeeded
   */
  get valid(): boolean {
    return Object.keys(this.errors).length === 0;
  }

  /**
   * Throw a ValidationError listing every failed field
   */
  assertValid(): void {
    if (!this.valid) {
      throw new ValidationError({ ...this.errors });
    }
  }

  private fail(field: string, message: string): void {
    (this.errors[field] ??= []).push(message);
  }
}
