/**
 * Error types for wireschema
 * Every failure is surfaced to the caller; nothing here is recovered locally
 */

export class WireSchemaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WireSchemaError';
  }
}

/**
 * A config section failed its class-validator constraints
 */
export class ConfigurationError extends WireSchemaError {
  constructor(
    readonly section: string,
    readonly problems: readonly string[],
  ) {
    super(`Invalid configuration for ${section}: ${problems.join('; ')}`);
    this.name = 'ConfigurationError';
  }
}

/**
 * A literal does not match the lexical grammar of its primitive type
 */
export class FormatError extends WireSchemaError {
  constructor(message: string) {
    super(message);
    this.name = 'FormatError';
  }
}

/**
 * A representation-specific accessor was called on a value of another representation
 */
export class RepresentationMismatchError extends WireSchemaError {
  constructor(
    readonly expected: string,
    readonly actual: string,
  ) {
    super(`PrimitiveValue is not a ${expected} representation (actual: ${actual})`);
    this.name = 'RepresentationMismatchError';
  }
}

export type SchemaValidationReason =
  | 'duplicate template id'
  | 'duplicate member id'
  | 'duplicate type name'
  | 'constant/type mismatch'
  | 'unresolved type'
  | 'cyclic type reference'
  | 'invalid member order'
  | 'invalid composite shape'
  | 'invalid version'
  | 'invalid block length'
  | 'invalid set choice'
  | 'invalid encoding type';

/**
 * Structural violation found while building or validating a schema
 * `entity` names the offending schema element, e.g. `message "Car" (id 1)`
 */
export class SchemaValidationError extends WireSchemaError {
  constructor(
    readonly reason: SchemaValidationReason,
    readonly entity: string,
    detail: string,
  ) {
    super(`${reason}: ${entity}: ${detail}`);
    this.name = 'SchemaValidationError';
  }
}
