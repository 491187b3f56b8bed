import path from "path";

export function runDir(stagingDir: string, runId: string): string {
  return path.join(stagingDir, runId);
}

export function syncManifestPath(stagingDir: string, runId: string): string {
  return path.join(runDir(stagingDir, runId), "sync_manifest.json");
}

export function diagramsDir(stagingDir: string, runId: string): string {
  return path.join(runDir(stagingDir, runId), "diagrams");
}

export function diagramStagingPath(
  stagingDir: string,
  runId: string,
  objectId: string,
  format: string
): string {
  return path.join(diagramsDir(stagingDir, runId), `${objectId}.${format}`);
}

export function renderedPagePath(stagingDir: string, runId: string, objectId: string): string {
  return path.join(runDir(stagingDir, runId), "pages", `${objectId}.html`);
}

export function backupsDir(stagingDir: string, runId: string): string {
  return path.join(runDir(stagingDir, runId), "backups");
}

export function pageBackupPath(
  backupDir: string,
  objectId: string,
  pageId: string,
  version: number
): string {
  return path.join(backupDir, `${objectId}-${pageId}-v${version}.html`);
}

export function defaultStateFile(stagingDir: string): string {
  return path.join(stagingDir, "page-index.json");
}
