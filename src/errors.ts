/**
 * Errors raised while encoding TOML. Every error carries a machine-readable
 * code and, where there is one, a hint for the caller.
 */

export type TomlEncodeErrorCode =
  | "CIRCULAR_REFERENCE"
  | "MIXED_ARRAY_OF_TABLES"
  | "INVALID_STRING"
  | "INVALID_OPTIONS"
  | "INVALID_SEPARATOR"
  | "INVALID_DESTINATION";

export abstract class TomlEncodeError extends Error {
  abstract readonly code: TomlEncodeErrorCode;

  readonly hint?: string;

  constructor(message: string, hint?: string) {
    super(message);
    this.name = this.constructor.name;
    if (hint) this.hint = hint;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      hint: this.hint,
    };
  }
}

// --- Structural ---

export class CircularReferenceError extends TomlEncodeError {
  readonly code = "CIRCULAR_REFERENCE";

  /** Dotted key of the table where the cycle closed, when known. */
  readonly key?: string;

  constructor(key?: string) {
    super(
      key ? `Circular reference detected at '${key}'` : "Circular reference detected",
      "A table or array must not contain itself, directly or through its children.",
    );
    this.key = key;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), key: this.key };
  }
}

export class MixedArrayError extends TomlEncodeError {
  readonly code = "MIXED_ARRAY_OF_TABLES";

  readonly key: string;

  constructor(key: string) {
    super(
      `Array '${key}' mixes tables with other values`,
      "An array holding tables is written as [[key]] blocks; every element must be a table.",
    );
    this.key = key;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), key: this.key };
  }
}

export class InvalidStringError extends TomlEncodeError {
  readonly code = "INVALID_STRING";

  /** The unpaired UTF-16 code unit. */
  readonly codeUnit: number;

  constructor(codeUnit: number) {
    super(
      `Unpaired surrogate U+${codeUnit.toString(16).toUpperCase()} in string`,
      "TOML strings must be valid Unicode; replace or drop the broken text before encoding.",
    );
    this.codeUnit = codeUnit;
  }
}

// --- Configuration ---

export class ConfigurationError extends TomlEncodeError {
  readonly code: TomlEncodeErrorCode = "INVALID_OPTIONS";
}

export class InvalidSeparatorError extends ConfigurationError {
  override readonly code = "INVALID_SEPARATOR";

  readonly separator: string;

  constructor(separator: string) {
    super(
      `Invalid separator for arrays: ${JSON.stringify(separator)}`,
      "Use a comma with optional surrounding whitespace, e.g. \", \" or \",\\n\".",
    );
    this.separator = separator;
  }
}

export class InvalidDestinationError extends ConfigurationError {
  override readonly code = "INVALID_DESTINATION";

  constructor(received: string) {
    super(
      `'destination' must be a path, a file URL or a writable object, got ${received}`,
      "Pass a file path string, a Buffer, a file: URL, or an object with a write(text) method.",
    );
  }
}
