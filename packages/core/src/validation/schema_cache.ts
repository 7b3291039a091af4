import Ajv from "ajv";
import type { SchemaObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import * as fs from "fs";
import * as yaml from "js-yaml";

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Singleton cache for schema validators to avoid repeated I/O and AJV compilation.
 */
export class SchemaValidationCache {
  private static validators = new Map<string, ValidateFunction>();
  private static ajv: Ajv | null = null;

  /**
   * Gets or creates a cached validator for the specified schema path.
   * @param schemaPath Absolute path to the YAML schema file
   * @throws Error if the file does not hold a schema object
   */
  static getValidator(schemaPath: string): ValidateFunction {
    const cached = this.validators.get(schemaPath);
    if (cached) {
      return cached;
    }

    if (!this.ajv) {
      this.ajv = new Ajv({ allErrors: true });
      addFormats(this.ajv);
    }

    const schema = yaml.load(fs.readFileSync(schemaPath, "utf8"));
    if (!isSchemaObject(schema)) {
      throw new Error(`Schema at ${schemaPath} is not a JSON-Schema object`);
    }
    const validator = this.ajv.compile(schema);
    this.validators.set(schemaPath, validator);
    return validator;
  }

  /**
   * Clears the cache (useful for testing or schema updates).
   */
  static clearCache(): void {
    this.validators.clear();
    this.ajv = null;
  }

  static getCacheStats(): { cachedSchemas: number; schemasLoaded: string[] } {
    return {
      cachedSchemas: this.validators.size,
      schemasLoaded: Array.from(this.validators.keys())
    };
  }
}
