import AjvModule, {
  type ErrorObject,
  type SchemaObject,
  type ValidateFunction,
} from 'ajv';

/**
 * JSON Schema Validator
 *
 * Validates configuration files against their JSON schemas
 */

const Ajv = AjvModule.default;

const ajv = new Ajv({
  allErrors: true,
  strict: false,
});

/**
 * Validation Result
 */
export interface ValidationResult<T> {
  valid: boolean;
  errors?: ErrorObject[];
  data?: T;
}

/**
 * Validator class for JSON schema validation
 */
export class SchemaValidator {
  /**
   * Compile a schema into a type-guarding validate function
   */
  compileSchema<T>(schema: SchemaObject): ValidateFunction<T> {
    return ajv.compile<T>(schema);
  }

  /**
   * Validate data with a compiled schema
   */
  validate<T>(compiled: ValidateFunction<T>, data: unknown): ValidationResult<T> {
    if (compiled(data)) {
      return { valid: true, data };
    }

    return { valid: false, errors: compiled.errors ?? undefined };
  }

  /**
   * Format validation errors as a readable string
   */
  formatErrors(errors?: ErrorObject[]): string {
    if (!errors || errors.length === 0) {
      return 'No errors';
    }

    return errors
      .map((error) => {
        const path = error.instancePath || 'root';
        const message = error.message || 'validation failed';
        const params = JSON.stringify(error.params);
        return `  • ${path}: ${message} ${params}`;
      })
      .join('\n');
  }
}

/**
 * Global validator instance
 */
export const validator = new SchemaValidator();
