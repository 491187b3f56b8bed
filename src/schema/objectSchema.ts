import path from "path";
import type { ValidateFunction } from "ajv";
import { compileJsonSchema, contractsSchemasDir } from "../validation/jsonSchema";

export const OBJECT_ROLES = ["vendor", "operations", "client"] as const;
export type ObjectRole = (typeof OBJECT_ROLES)[number];

export interface ObjectField {
  name: string;
  type: string;
  description?: string;
  required?: boolean;
}

export interface DiagramDeclaration {
  fileKey?: string;
  nodeId?: string;
  nodeName?: string;
}

export type RoleLinks = Partial<Record<ObjectRole, string | null>>;

/** platform -> view -> role links, e.g. views.desktop["grid-view"].vendor */
export type ObjectViews = Record<string, Record<string, RoleLinks>>;

export interface PlatformObjectSchema {
  name?: string;
  title?: string;
  description?: string;
  owner?: string;
  fields?: ObjectField[];
  diagram?: string | DiagramDeclaration | null;
  page?: string | null;
  views?: ObjectViews;
}

const OBJECT_SCHEMA_FILE = "platform-object.schema.json";

let validatorPromise: Promise<ValidateFunction<PlatformObjectSchema>> | null = null;

export function getObjectSchemaValidator(): Promise<ValidateFunction<PlatformObjectSchema>> {
  if (!validatorPromise) {
    validatorPromise = compileJsonSchema<PlatformObjectSchema>(
      path.join(contractsSchemasDir(), OBJECT_SCHEMA_FILE)
    );
  }
  return validatorPromise;
}
