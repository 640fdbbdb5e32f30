import type { FieldType } from './types.js';

/** A filter or sort key does not resolve to a scalar field of the schema. */
export class KeyNotFoundError extends Error {
  override readonly name = 'KeyNotFoundError';

  constructor(readonly key: string) {
    super(`${key} is invalid key`);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A supplied value cannot be parsed under the declared field type. */
export class InvalidDataTypeError extends Error {
  override readonly name = 'InvalidDataTypeError';
  readonly key: string;
  readonly fieldType: FieldType;

  constructor(
    detail: { key: string; fieldType: FieldType; message?: string },
    override readonly cause?: unknown,
  ) {
    super(detail.message ?? `Invalid value for key ${detail.key}: expected ${detail.fieldType}`);
    this.key = detail.key;
    this.fieldType = detail.fieldType;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** The request body or its pagination parameters are malformed. */
export class InvalidRequestError extends Error {
  override readonly name = 'InvalidRequestError';

  constructor(
    message: string,
    readonly details?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class SchemaDefinitionError extends Error {
  override readonly name = 'SchemaDefinitionError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** The execution collaborator failed while running an already-compiled search. */
export class SearchExecutionError extends Error {
  override readonly name = 'SearchExecutionError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
