import path from "path";
import { loadLocalConfig, loadSyncConfig, type ConfigOverrides } from "../config/loadConfig";
import type { LocalConfig } from "../config/configSchema";
import { ConfigurationError, errorMessage } from "../errors";
import { DiagramFetcher } from "../design/fetcher";
import { FigmaClient } from "../design/figma";
import { ConfluenceClient } from "../docs/confluence";
import { DryRunPageSink } from "../docs/dryRun";
import { DocumentationPublisher, type PageSink } from "../docs/publisher";
import { PageIndex } from "../io/pageIndex";
import { backupsDir, defaultStateFile, diagramStagingPath, diagramsDir, syncManifestPath } from "../io/paths";
import { renderObjectPage } from "../render/objectPage";
import { loadPageTemplates } from "../render/templates";
import { loadObjectSchemas } from "../schema/loader";
import { runSyncPipeline } from "../sync/orchestrator";
import { buildSyncManifest, exitCodeFor, formatSummary } from "../sync/summary";
import type { Logger } from "../types/logger";
import type { SyncRunSummary } from "../types/syncResult";
import { writeJson } from "../utils/fs";
import type { FetchLike } from "../utils/http";
import { nowUtcIsoFileSafe } from "../utils/time";

export interface SyncOptions {
  configPath?: string;
  schemaDir?: string;
  stagingDir?: string;
  concurrency?: number;
  runId?: string;
  dryRun?: boolean;
  force?: boolean;
  strict?: boolean;
}

/** Collaborators that tests replace; production uses the defaults. */
export interface SyncDependencies {
  env?: NodeJS.ProcessEnv;
  fetch?: FetchLike;
  logger?: Logger;
  signal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export interface SyncCommandResult {
  summary: SyncRunSummary;
  manifestPath: string;
  exitCode: number;
}

function overridesFrom(options: SyncOptions): ConfigOverrides {
  return {
    schemaDir: options.schemaDir,
    stagingDir: options.stagingDir,
    concurrency: options.concurrency
  };
}

export async function runSync(options: SyncOptions, deps: SyncDependencies = {}): Promise<SyncCommandResult> {
  const logger = deps.logger ?? console;
  const loadOptions = { configPath: options.configPath, env: deps.env, overrides: overridesFrom(options) };

  // Credentials are checked before any schema file is read.
  let config: LocalConfig;
  let publisherFor: (stagingDir: string, runId: string, pageIndex: PageIndex) => PageSink;
  if (options.dryRun) {
    config = await loadLocalConfig(loadOptions);
    publisherFor = (stagingDir, runId) => new DryRunPageSink(stagingDir, runId, logger);
  } else {
    const syncConfig = await loadSyncConfig(loadOptions);
    config = syncConfig;
    const client = new ConfluenceClient({
      baseUrl: syncConfig.docs.baseUrl,
      username: syncConfig.docs.username,
      apiToken: syncConfig.docs.apiToken,
      fetch: deps.fetch
    });
    publisherFor = (stagingDir, runId, pageIndex) =>
      new DocumentationPublisher({
        client,
        spaceKey: syncConfig.docs.spaceKey,
        parentPageId: syncConfig.docs.parentPageId ?? null,
        pageIndex,
        backupDir: backupsDir(stagingDir, runId),
        force: options.force,
        logger
      });
  }

  const schemaDir = path.resolve(config.schemaDir);
  const stagingDir = path.resolve(config.stagingDir);
  const runId = options.runId ?? nowUtcIsoFileSafe(deps.now?.());
  const templates = await loadPageTemplates(config.templatesDir ? path.resolve(config.templatesDir) : undefined);
  const pageIndex = await PageIndex.load(path.resolve(config.stateFile ?? defaultStateFile(stagingDir))).catch(
    (error: unknown) => {
      throw new ConfigurationError(errorMessage(error), { cause: error });
    }
  );

  const { descriptors, errors } = await loadObjectSchemas(schemaDir, { pageIndex });
  logger.log(`Found ${descriptors.length + errors.length} schema files in ${schemaDir}`);
  for (const loadError of errors) {
    logger.warn(`Skipping ${loadError.sourceFile}: ${loadError.error.message}`);
  }

  const fetcher = new DiagramFetcher({
    client: new FigmaClient({ apiToken: config.design.apiToken, baseUrl: config.design.baseUrl, fetch: deps.fetch }),
    defaultFileKey: config.design.fileKey ?? null,
    placeholderUrl: config.design.placeholderUrl ?? null,
    format: config.design.format,
    scale: config.design.scale,
    retry: config.retry,
    sleep: deps.sleep,
    logger
  });

  let summary: SyncRunSummary;
  try {
    summary = await runSyncPipeline({
      runId,
      descriptors,
      loadErrors: errors,
      fetcher,
      renderer: (descriptor, artifact) =>
        renderObjectPage(descriptor, artifact, templates, { now: deps.now?.() }),
      publisher: publisherFor(stagingDir, runId, pageIndex),
      stagingPath: (descriptor) => diagramStagingPath(stagingDir, runId, descriptor.id, config.design.format),
      stagingDir: diagramsDir(stagingDir, runId),
      concurrency: config.concurrency,
      signal: deps.signal,
      logger
    });
  } finally {
    if (!options.dryRun) {
      await pageIndex.save();
    }
  }

  const manifestPath = syncManifestPath(stagingDir, runId);
  await writeJson(
    manifestPath,
    buildSyncManifest(summary, { schemaDir, stagingDir, dryRun: Boolean(options.dryRun) })
  );

  logger.log("");
  logger.log(formatSummary(summary));
  logger.log(`Run manifest: ${manifestPath}`);

  return { summary, manifestPath, exitCode: exitCodeFor(summary, { strict: options.strict }) };
}
