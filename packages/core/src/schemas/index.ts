export { getAjv, compileSchema, compileSchemaObject, formatSchemaErrors } from "./schema_validator";
