import type { SyncManifest } from "../types/syncManifest";
import type { SyncRunSummary } from "../types/syncResult";

export interface ManifestContext {
  schemaDir: string;
  stagingDir: string;
  dryRun: boolean;
}

export function buildSyncManifest(summary: SyncRunSummary, context: ManifestContext): SyncManifest {
  return {
    schema_version: "1.0",
    run_id: summary.runId,
    schema_dir: context.schemaDir,
    staging_dir: context.stagingDir,
    dry_run: context.dryRun,
    started_at: summary.startedAt,
    ended_at: summary.endedAt,
    aborted: summary.aborted,
    counts: summary.counts,
    results: summary.results.map((result) => ({
      object_id: result.objectId,
      source_file: result.sourceFile,
      status: result.status,
      stage: result.stage,
      error: result.kind ? { kind: result.kind, message: result.message ?? "" } : null,
      page_id: result.pageId,
      action: result.action
    }))
  };
}

export function formatSummary(summary: SyncRunSummary): string {
  const { counts } = summary;
  const lines = [
    `Sync ${summary.aborted ? "aborted" : "complete"}: ${counts.total} objects, ${counts.succeeded} succeeded, ${counts.skipped} skipped, ${counts.failed} failed`
  ];

  const failed = summary.results.filter((result) => result.status === "failed");
  if (failed.length > 0) {
    lines.push("Failed:");
    for (const result of failed) {
      lines.push(`  - ${result.objectId} (${result.sourceFile}) [${result.kind} during ${result.stage}]: ${result.message}`);
    }
  }

  const skipped = summary.results.filter((result) => result.status === "skipped");
  if (skipped.length > 0) {
    lines.push("Skipped:");
    for (const result of skipped) {
      const reason = result.kind ? `${result.kind}: ${result.message}` : result.message;
      lines.push(`  - ${result.objectId} (${result.sourceFile}): ${reason}`);
    }
  }

  return lines.join("\n");
}

/** Exit code for the CLI: 0 for a clean run. */
export function exitCodeFor(summary: SyncRunSummary, options: { strict?: boolean } = {}): number {
  if (summary.aborted || summary.counts.failed > 0) return 1;
  const parseErrors = summary.results.some((result) => result.kind === "SchemaParseError");
  if (options.strict && parseErrors) return 1;
  return 0;
}
