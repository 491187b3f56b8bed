import { promises as fs } from "fs";
import path from "path";
import Ajv, { SchemaObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import { findUp } from "../utils/fs";

const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

export function contractsSchemasDir(): string {
  return findUp(path.join("contracts", "schemas"));
}

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export async function loadJsonSchema(schemaPath: string): Promise<SchemaObject> {
  const content = await fs.readFile(schemaPath, "utf8");
  if (!content.trim()) {
    throw new Error(`Schema file is empty: ${schemaPath}`);
  }
  const parsed: unknown = JSON.parse(content);
  if (!isSchemaObject(parsed)) {
    throw new Error(`Schema file does not contain a JSON object: ${schemaPath}`);
  }
  return parsed;
}

export async function compileJsonSchema<T>(schemaPath: string): Promise<ValidateFunction<T>> {
  const schema = await loadJsonSchema(schemaPath);
  return ajv.compile<T>(schema);
}

export function describeSchemaErrors(validator: ValidateFunction): string {
  return (validator.errors ?? [])
    .map((error) => `${error.instancePath || "<root>"} ${error.message ?? "is invalid"}`)
    .join("; ");
}
