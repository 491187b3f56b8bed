import type { SyncErrorKind } from "../errors";
import type { PublishAction } from "./renderedPage";

export type SyncStatus = "success" | "skipped" | "failed";

export type SyncStage = "load" | "fetch" | "render" | "publish";

/** loaded -> diagram_fetched -> rendered -> published; a failure is recorded on the result's status. */
export type ObjectState = "loaded" | "diagram_fetched" | "rendered" | "published";

export interface SyncResult {
  objectId: string;
  sourceFile: string;
  status: SyncStatus;
  stage: SyncStage;
  kind: SyncErrorKind | null;
  message: string | null;
  pageId: string | null;
  action: PublishAction | null;
}

export interface SyncCounts {
  total: number;
  succeeded: number;
  skipped: number;
  failed: number;
}

export interface SyncRunSummary {
  runId: string;
  startedAt: string;
  endedAt: string;
  aborted: boolean;
  counts: SyncCounts;
  results: SyncResult[];
}
