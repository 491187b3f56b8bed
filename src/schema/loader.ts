import path from "path";
import { promises as fs } from "fs";
import { ConfigurationError, SchemaParseError, errorMessage } from "../errors";
import { normalizeNodeId, parseDesignUrl } from "../design/nodeRef";
import { parsePageId } from "../docs/pageRef";
import type { PageIndex } from "../io/pageIndex";
import type { DiagramRef, ObjectDescriptor } from "../types/objectDescriptor";
import { pathExists, listFiles } from "../utils/fs";
import { titleCase } from "../utils/text";
import { describeSchemaErrors } from "../validation/jsonSchema";
import { getObjectSchemaValidator, PlatformObjectSchema } from "./objectSchema";

export interface SchemaLoadError {
  sourcePath: string;
  sourceFile: string;
  /** File stem; the declared name of a rejected file is not trusted. */
  objectId: string;
  error: SchemaParseError;
}

export interface SchemaLoadResult {
  descriptors: ObjectDescriptor[];
  errors: SchemaLoadError[];
}

export interface LoadOptions {
  pageIndex?: PageIndex;
}

function fileStem(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

function toDiagramRef(diagram: PlatformObjectSchema["diagram"]): DiagramRef | null {
  if (diagram === undefined || diagram === null) return null;
  if (typeof diagram === "string") return parseDesignUrl(diagram);
  return {
    fileKey: diagram.fileKey ?? null,
    nodeId: diagram.nodeId ? normalizeNodeId(diagram.nodeId) : null,
    nodeName: diagram.nodeName ?? null
  };
}

async function parseSchemaFile(
  filePath: string,
  options: LoadOptions
): Promise<ObjectDescriptor> {
  const content = await fs.readFile(filePath, "utf8");
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new SchemaParseError(filePath, `Invalid JSON: ${errorMessage(error)}`, { cause: error });
  }

  const validate = await getObjectSchemaValidator();
  if (!validate(data)) {
    throw new SchemaParseError(filePath, `Schema validation failed: ${describeSchemaErrors(validate)}`);
  }

  const id = data.name ?? fileStem(filePath);
  let diagramRef: DiagramRef | null;
  let declaredPageId: string | null;
  try {
    diagramRef = toDiagramRef(data.diagram);
    declaredPageId = data.page ? parsePageId(data.page) : null;
  } catch (error) {
    throw new SchemaParseError(filePath, errorMessage(error), { cause: error });
  }

  return {
    id,
    sourcePath: filePath,
    sourceFile: path.basename(filePath),
    title: data.title ?? titleCase(id),
    schema: data,
    pageId: declaredPageId ?? options.pageIndex?.get(id) ?? null,
    diagramRef
  };
}

/**
 * Reads every `*.json` file directly inside `schemaDir` in filename order.
 * Malformed files are reported in `errors` and do not stop the load.
 */
export async function loadObjectSchemas(
  schemaDir: string,
  options: LoadOptions = {}
): Promise<SchemaLoadResult> {
  if (!(await pathExists(schemaDir))) {
    throw new ConfigurationError(`Schema directory not found: ${schemaDir}`);
  }

  const files = await listFiles(schemaDir, (name) => name.toLowerCase().endsWith(".json"));
  const descriptors: ObjectDescriptor[] = [];
  const errors: SchemaLoadError[] = [];
  const seen = new Map<string, string>();

  for (const filePath of files) {
    const sourceFile = path.basename(filePath);
    try {
      const descriptor = await parseSchemaFile(filePath, options);
      const previous = seen.get(descriptor.id);
      if (previous) {
        throw new SchemaParseError(
          filePath,
          `Duplicate object id "${descriptor.id}" (already declared by ${previous})`
        );
      }
      seen.set(descriptor.id, sourceFile);
      descriptors.push(descriptor);
    } catch (error) {
      const parseError =
        error instanceof SchemaParseError
          ? error
          : new SchemaParseError(filePath, errorMessage(error), { cause: error });
      errors.push({ sourcePath: filePath, sourceFile, objectId: fileStem(filePath), error: parseError });
    }
  }

  return { descriptors, errors };
}
