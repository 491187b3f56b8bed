import { RenderFailed, SyncError, errorMessage, type SyncErrorKind } from "../errors";
import type { DiagramSource } from "../design/fetcher";
import type { PageSink } from "../docs/publisher";
import type { SchemaLoadError } from "../schema/loader";
import type { DiagramArtifact } from "../types/diagramArtifact";
import type { Logger } from "../types/logger";
import type { ObjectDescriptor } from "../types/objectDescriptor";
import type { RenderedPage } from "../types/renderedPage";
import type { ObjectState, SyncResult, SyncRunSummary, SyncStage } from "../types/syncResult";
import { removePath } from "../utils/fs";
import { nowUtcIsoSeconds } from "../utils/time";

export type PageRenderer = (descriptor: ObjectDescriptor, artifact: DiagramArtifact) => RenderedPage;

export interface SyncPipelineInput {
  runId: string;
  descriptors: ObjectDescriptor[];
  /** Files the loader rejected; reported as skipped. */
  loadErrors?: SchemaLoadError[];
  fetcher: DiagramSource;
  renderer: PageRenderer;
  publisher: PageSink;
  /** Where the diagram of `descriptor` is staged for this run; must differ per object. */
  stagingPath: (descriptor: ObjectDescriptor) => string;
  /** Removed once every object has finished. */
  stagingDir?: string;
  concurrency?: number;
  /** Stops scheduling objects; objects already running are allowed to finish. */
  signal?: AbortSignal;
  logger?: Logger;
}

const STAGE_ERROR_KIND: Record<Exclude<SyncStage, "load">, SyncErrorKind> = {
  fetch: "DiagramUnavailable",
  render: "RenderFailed",
  publish: "PublishFailed"
};

function stageFor(state: ObjectState): Exclude<SyncStage, "load"> {
  switch (state) {
    case "loaded":
      return "fetch";
    case "diagram_fetched":
      return "render";
    default:
      return "publish";
  }
}

function baseResult(descriptor: ObjectDescriptor): SyncResult {
  return {
    objectId: descriptor.id,
    sourceFile: descriptor.sourceFile,
    status: "success",
    stage: "fetch",
    kind: null,
    message: null,
    pageId: descriptor.pageId,
    action: null
  };
}

async function syncObject(
  descriptor: ObjectDescriptor,
  input: SyncPipelineInput,
  logger: Logger
): Promise<SyncResult> {
  const result = baseResult(descriptor);
  let state: ObjectState = "loaded";
  let artifact: DiagramArtifact | null = null;

  try {
    artifact = await input.fetcher.fetchDiagram(descriptor, input.stagingPath(descriptor));
    state = "diagram_fetched";

    let page: RenderedPage;
    try {
      page = input.renderer(descriptor, artifact);
    } catch (error) {
      if (error instanceof SyncError) throw error;
      throw new RenderFailed(`Rendering "${descriptor.id}" failed: ${errorMessage(error)}`, { cause: error });
    }
    state = "rendered";

    const outcome = await input.publisher.upsertPage(descriptor, artifact, page);
    state = "published";

    result.stage = "publish";
    result.pageId = outcome.pageId;
    result.action = outcome.action;
    if (outcome.action === "unchanged") {
      result.status = "skipped";
      result.message = "content unchanged";
    }
  } catch (error) {
    const stage = stageFor(state);
    result.status = "failed";
    result.stage = stage;
    result.kind = error instanceof SyncError ? error.kind : STAGE_ERROR_KIND[stage];
    result.message = errorMessage(error);
    logger.error(`[${descriptor.id}] failed during ${stage}: ${result.kind}: ${result.message}`);
  } finally {
    if (artifact) {
      const staged = artifact.path;
      await removePath(staged).catch((error: unknown) => {
        logger.warn(`[${descriptor.id}] could not remove staged diagram ${staged}: ${errorMessage(error)}`);
      });
    }
  }

  return result;
}

function loadErrorResult(loadError: SchemaLoadError): SyncResult {
  return {
    objectId: loadError.objectId,
    sourceFile: loadError.sourceFile,
    status: "skipped",
    stage: "load",
    kind: loadError.error.kind,
    message: loadError.error.message,
    pageId: null,
    action: null
  };
}

function abortedResult(descriptor: ObjectDescriptor): SyncResult {
  return {
    ...baseResult(descriptor),
    status: "skipped",
    kind: "Aborted",
    message: "not processed: run aborted"
  };
}

function compareSourceFiles(a: SyncResult, b: SyncResult): number {
  if (a.sourceFile === b.sourceFile) return 0;
  return a.sourceFile < b.sourceFile ? -1 : 1;
}

export function countResults(results: SyncResult[]): SyncRunSummary["counts"] {
  return {
    total: results.length,
    succeeded: results.filter((result) => result.status === "success").length,
    skipped: results.filter((result) => result.status === "skipped").length,
    failed: results.filter((result) => result.status === "failed").length
  };
}

/**
 * Runs fetch -> render -> publish for every descriptor. A failing object is
 * recorded and never stops the others.
 */
export async function runSyncPipeline(input: SyncPipelineInput): Promise<SyncRunSummary> {
  const logger = input.logger ?? console;
  const startedAt = nowUtcIsoSeconds();
  const descriptors = input.descriptors;
  const total = descriptors.length;
  const results: (SyncResult | undefined)[] = Array.from({ length: total }, () => undefined);
  const concurrency = Math.max(1, Math.min(input.concurrency ?? 1, total || 1));
  let next = 0;

  async function worker(): Promise<void> {
    while (next < total && !input.signal?.aborted) {
      const index = next++;
      const descriptor = descriptors[index];
      logger.log(`Processing ${descriptor.id} (${index + 1} of ${total})...`);
      results[index] = await syncObject(descriptor, input, logger);
    }
  }

  try {
    await Promise.all(Array.from({ length: concurrency }, () => worker()));
  } finally {
    if (input.stagingDir) {
      await removePath(input.stagingDir).catch((error: unknown) => {
        logger.warn(`Could not remove staging directory ${input.stagingDir}: ${errorMessage(error)}`);
      });
    }
  }

  const aborted = Boolean(input.signal?.aborted) && results.some((result) => result === undefined);
  const objectResults = descriptors.map((descriptor, index) => results[index] ?? abortedResult(descriptor));
  const all = [...objectResults, ...(input.loadErrors ?? []).map(loadErrorResult)].sort(compareSourceFiles);

  return {
    runId: input.runId,
    startedAt,
    endedAt: nowUtcIsoSeconds(),
    aborted,
    counts: countResults(all),
    results: all
  };
}
