import os from "os";
import path from "path";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "../errors";
import { pathExists, readJson } from "../utils/fs";
import {
  LocalConfigSchema,
  SyncConfigSchema,
  ValidateConfigSchema,
  type LocalConfig,
  type SyncConfig,
  type ValidateConfig
} from "./configSchema";

const DEFAULT_CONFIG_FILE = path.join(os.homedir(), ".objects-sync-config.json");

/** Environment variable -> config key path. */
const ENV_KEYS: Record<string, string> = {
  FIGMA_API_TOKEN: "design.apiToken",
  FIGMA_API_URL: "design.baseUrl",
  FIGMA_FILE_KEY: "design.fileKey",
  FIGMA_PLACEHOLDER_URL: "design.placeholderUrl",
  CONFLUENCE_API_TOKEN: "docs.apiToken",
  CONFLUENCE_USERNAME: "docs.username",
  CONFLUENCE_BASE_URL: "docs.baseUrl",
  CONFLUENCE_SPACE_KEY: "docs.spaceKey",
  CONFLUENCE_PARENT_PAGE_ID: "docs.parentPageId",
  OBJECTS_SCHEMA_DIR: "schemaDir",
  OBJECTS_STAGING_DIR: "stagingDir",
  OBJECTS_STATE_FILE: "stateFile",
  OBJECTS_TEMPLATES_DIR: "templatesDir",
  OBJECTS_SYNC_CONCURRENCY: "concurrency",
  OBJECTS_SYNC_RETRY_ATTEMPTS: "retry.attempts",
  OBJECTS_SYNC_RETRY_BASE_DELAY_MS: "retry.baseDelayMs",
  OBJECTS_SYNC_RETRY_MAX_DELAY_MS: "retry.maxDelayMs",
  OBJECTS_SYNC_RETRY_FACTOR: "retry.factor"
};

export type ConfigOverrides = Record<string, string | number | undefined>;

export interface LoadConfigOptions {
  /** Explicit config file; it must exist. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  /** Key path -> value, e.g. { schemaDir: "./schemas" }; highest precedence. */
  overrides?: ConfigOverrides;
}

type ConfigTree = Record<string, unknown>;

function isTree(value: unknown): value is ConfigTree {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function setPath(tree: ConfigTree, keyPath: string, value: unknown): void {
  const keys = keyPath.split(".");
  let node = tree;
  for (const key of keys.slice(0, -1)) {
    const child = node[key];
    if (isTree(child)) {
      node = child;
    } else {
      const created: ConfigTree = {};
      node[key] = created;
      node = created;
    }
  }
  node[keys[keys.length - 1]] = value;
}

function envVarFor(keyPath: string): string | undefined {
  return Object.keys(ENV_KEYS).find((name) => ENV_KEYS[name] === keyPath);
}

async function readConfigFile(options: LoadConfigOptions): Promise<ConfigTree> {
  const env = options.env ?? process.env;
  const explicit = options.configPath ?? env.OBJECTS_SYNC_CONFIG;
  const filePath = explicit ?? DEFAULT_CONFIG_FILE;
  if (!(await pathExists(filePath))) {
    if (explicit) throw new ConfigurationError(`Config file not found: ${filePath}`);
    return {};
  }
  let data: unknown;
  try {
    data = await readJson(filePath);
  } catch (error) {
    throw new ConfigurationError(`Config file ${filePath} is not valid JSON: ${errorMessage(error)}`, { cause: error });
  }
  if (!isTree(data)) {
    throw new ConfigurationError(`Config file ${filePath} must contain a JSON object`);
  }
  return data;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const keyPath = issue.path.join(".");
      const envVar = envVarFor(keyPath);
      return `  - ${keyPath || "<root>"} ${issue.message}${envVar ? ` (set ${envVar})` : ""}`;
    })
    .join("\n");
}

async function collectConfig(options: LoadConfigOptions): Promise<ConfigTree> {
  const env = options.env ?? process.env;
  const tree = await readConfigFile(options);
  for (const [name, keyPath] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value !== undefined && value !== "") setPath(tree, keyPath, value);
  }
  for (const [keyPath, value] of Object.entries(options.overrides ?? {})) {
    if (value !== undefined) setPath(tree, keyPath, value);
  }
  return tree;
}

function parseConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, tree: ConfigTree): T {
  const parsed = schema.safeParse(tree);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration:\n${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

/** Configuration for a full sync; every credential must be present. */
export async function loadSyncConfig(options: LoadConfigOptions = {}): Promise<SyncConfig> {
  return parseConfig(SyncConfigSchema, await collectConfig(options));
}

/** Configuration for work that never reaches the documentation platform. */
export async function loadLocalConfig(options: LoadConfigOptions = {}): Promise<LocalConfig> {
  return parseConfig(LocalConfigSchema, await collectConfig(options));
}

/** Directories only; used by `validate`, which contacts neither remote system. */
export async function loadValidateConfig(options: LoadConfigOptions = {}): Promise<ValidateConfig> {
  return parseConfig(ValidateConfigSchema, await collectConfig(options));
}
