/**
 * @file errors.ts
 * @module shared/errors
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Fatal errors that abort a conversion run.
 */

export type ConversionErrorCode =
  | 'MISSING_INPUT'
  | 'METADATA_FORMAT'
  | 'OVERWRITE_FORMAT'
  | 'OVERWRITE_VALIDATION'
  | 'STRUCTURAL'
  | 'PATH_COLLISION'
  | 'CONFIGURATION';

/**
 * Base class for every error that halts the whole batch.
 *
 * @example
 * ```typescript
 * try {
 *   await converter.convert(options);
 * } catch (error) {
 *   if (error instanceof ConversionError) {
 *     console.error(`Error: ${error.message}`);
 *   }
 * }
 * ```
 */
export class ConversionError extends Error {
  readonly code: ConversionErrorCode;

  constructor(code: ConversionErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A required input directory or file does not exist.
 */
export class MissingInputError extends ConversionError {
  readonly path: string;

  constructor(path: string, what: string) {
    super('MISSING_INPUT', `${what} not found: ${path}`);
    this.path = path;
  }
}

/**
 * A metadata document does not have the expected shape.
 */
export class MetadataFormatError extends ConversionError {
  constructor(file: string, detail: string) {
    super('METADATA_FORMAT', `Invalid metadata in ${file}: ${detail}`);
  }
}

/**
 * An overwrite document has a malformed header.
 */
export class OverwriteFormatError extends ConversionError {
  constructor(source: string, detail: string) {
    super('OVERWRITE_FORMAT', `${detail} in overwrite file ${source}`);
  }
}

/**
 * An overwrite document parsed but is not usable.
 */
export class OverwriteValidationError extends ConversionError {
  constructor(source: string, detail: string) {
    super('OVERWRITE_VALIDATION', `Overwrite file ${source} ${detail}`);
  }
}

/**
 * The item graph or the store lifecycle is inconsistent.
 */
export class StructuralError extends ConversionError {
  constructor(message: string) {
    super('STRUCTURAL', message);
  }
}

/**
 * Two documents resolved to the same output path.
 */
export class PathCollisionError extends ConversionError {
  readonly path: string;

  constructor(path: string) {
    super('PATH_COLLISION', `${path} has already been written to`);
    this.path = path;
  }
}

/**
 * A configuration file could not be used.
 */
export class ConfigurationError extends ConversionError {
  constructor(source: string, detail: string) {
    super('CONFIGURATION', `Invalid configuration in ${source}: ${detail}`);
  }
}
