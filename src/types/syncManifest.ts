export interface SyncManifestResult {
  object_id: string;
  source_file: string;
  status: "success" | "skipped" | "failed";
  stage: string;
  error: { kind: string; message: string } | null;
  page_id: string | null;
  action: string | null;
}

export interface SyncManifest {
  schema_version: "1.0";
  run_id: string;
  schema_dir: string;
  staging_dir: string;
  dry_run: boolean;
  started_at: string;
  ended_at: string;
  aborted: boolean;
  counts: { total: number; succeeded: number; skipped: number; failed: number };
  results: SyncManifestResult[];
}
