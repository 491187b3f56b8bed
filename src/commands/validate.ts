import path from "path";
import { loadValidateConfig } from "../config/loadConfig";
import { ConfigurationError, errorMessage } from "../errors";
import { PageIndex } from "../io/pageIndex";
import { defaultStateFile } from "../io/paths";
import { loadObjectSchemas } from "../schema/loader";
import type { Logger } from "../types/logger";

export interface ValidateOptions {
  configPath?: string;
  schemaDir?: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

export interface ValidateResult {
  valid: number;
  invalid: number;
  exitCode: number;
}

/** Loads every schema file without contacting either remote system. */
export async function runValidate(options: ValidateOptions = {}): Promise<ValidateResult> {
  const logger = options.logger ?? console;
  const config = await loadValidateConfig({
    configPath: options.configPath,
    env: options.env,
    overrides: { schemaDir: options.schemaDir }
  });
  const schemaDir = path.resolve(config.schemaDir);
  const stateFile = path.resolve(config.stateFile ?? defaultStateFile(path.resolve(config.stagingDir)));
  const pageIndex = await PageIndex.load(stateFile).catch((error: unknown) => {
    throw new ConfigurationError(errorMessage(error), { cause: error });
  });

  const { descriptors, errors } = await loadObjectSchemas(schemaDir, { pageIndex });
  logger.log(`Found ${descriptors.length + errors.length} schema files in ${schemaDir}`);
  descriptors.forEach((descriptor, index) => {
    const page = descriptor.pageId ? `page ${descriptor.pageId}` : "no page yet";
    logger.log(` ${index + 1}: ${descriptor.sourceFile} -> ${descriptor.id} (${page})`);
  });
  for (const loadError of errors) {
    logger.error(`${loadError.sourceFile}: ${loadError.error.kind}: ${loadError.error.message}`);
  }

  return {
    valid: descriptors.length,
    invalid: errors.length,
    exitCode: errors.length > 0 ? 1 : 0
  };
}
