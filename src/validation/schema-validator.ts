/**
 * Schema Validator
 *
 * JSON Schema validation using ajv for request bodies.
 * Compiles schemas once, when they are registered.
 *
 * @module marquee/validation/schema-validator
 */

import Ajv, { type ErrorObject, type ValidateFunction } from "ajv";

/**
 * Validation error with formatted message
 */
export interface ValidationError {
  /** Error message */
  message: string;
  /** JSON pointer to the invalid property ("/" for the document) */
  path: string;
  /** Invalid value */
  value?: unknown;
  /** Expected type or constraint */
  expected?: string;
}

/**
 * Validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

/**
 * Schema validator with compiled schema caching
 *
 * @example
 * ```typescript
 * const validator = new SchemaValidator();
 *
 * validator.addSchema("movie.create", {
 *   type: "object",
 *   properties: { title: { type: "string" } },
 *   additionalProperties: false,
 * });
 *
 * const result = validator.validate("movie.create", body);
 * if (!result.valid) {
 *   throw new BadRequestError(result.errors[0].message);
 * }
 * ```
 */
export class SchemaValidator {
  private ajv: Ajv;
  private validators = new Map<string, ValidateFunction>();

  constructor() {
    this.ajv = new Ajv({
      allErrors: true, // Report all errors, not just first
      strict: false, // Allow additional keywords
      coerceTypes: false, // Wrong JSON types are client errors
      verbose: true, // Keep the offending value on each error
    });
  }

  /**
   * Add a schema under a name
   */
  addSchema(name: string, schema: Record<string, unknown>): void {
    this.validators.set(name, this.ajv.compile(schema));
  }

  /**
   * Check if a schema exists
   */
  hasSchema(name: string): boolean {
    return this.validators.has(name);
  }

  /**
   * Validate a value against a named schema
   *
   * @throws Error when no schema is registered under `name`
   */
  validate(name: string, data: unknown): ValidationResult {
    const validate = this.validators.get(name);
    if (!validate) {
      throw new Error(`[SchemaValidator] no schema registered as "${name}"`);
    }

    if (validate(data)) {
      return { valid: true, errors: [] };
    }

    return { valid: false, errors: this.formatErrors(validate.errors ?? []) };
  }

  /**
   * Format ajv errors into readable messages
   */
  private formatErrors(errors: ErrorObject[]): ValidationError[] {
    return errors.map((error) => {
      const path = error.instancePath || "/";
      const param: Record<string, unknown> = error.params;

      let message: string;
      let expected: string | undefined;

      switch (error.keyword) {
        case "required":
          message = `Missing required property: ${String(param.missingProperty)}`;
          break;

        case "type":
          message = `Property ${path} must be ${String(param.type)}`;
          expected = String(param.type);
          break;

        case "minimum":
          message = `Property ${path} must be >= ${String(param.limit)}`;
          expected = `>= ${String(param.limit)}`;
          break;

        case "maximum":
          message = `Property ${path} must be <= ${String(param.limit)}`;
          expected = `<= ${String(param.limit)}`;
          break;

        case "pattern":
          message = `Property ${path} must match pattern: ${String(param.pattern)}`;
          expected = String(param.pattern);
          break;

        case "additionalProperties":
          message = `Unknown property: ${String(param.additionalProperty)}`;
          break;

        default:
          message = error.message ?? `Validation failed at ${path}`;
      }

      return {
        message,
        path,
        value: error.data,
        expected,
      };
    });
  }
}
