import Ajv from "ajv";
import type { ErrorObject, JSONSchemaType, SchemaObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";

let sharedAjv: Ajv | null = null;

/**
 * Shared AJV instance (allErrors, string formats registered).
 */
export function getAjv(): Ajv {
  if (!sharedAjv) {
    sharedAjv = new Ajv({ allErrors: true });
    addFormats(sharedAjv);
  }
  return sharedAjv;
}

/**
 * Compiles a typed schema; the returned function is a type guard for T.
 */
export function compileSchema<T>(schema: JSONSchemaType<T>): ValidateFunction<T> {
  return getAjv().compile(schema);
}

/**
 * Compiles a plain schema object into a type guard for T.
 *
 * For shapes JSONSchemaType cannot express, such as a required property
 * typed `X | null`. The schema is not checked against T, so its test
 * must cover the null branch.
 */
export function compileSchemaObject<T>(schema: SchemaObject): ValidateFunction<T> {
  return getAjv().compile<T>(schema);
}

/**
 * One line per AJV error, as "<path>: <message>".
 */
export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) {
    return "unknown validation error";
  }
  return errors
    .map((error) => {
      const missing = error.params["missingProperty"];
      const field = typeof missing === "string"
        ? `${error.instancePath}/${missing}`
        : error.instancePath || "/";
      return `${field}: ${error.message ?? "invalid"}`;
    })
    .join("; ");
}
