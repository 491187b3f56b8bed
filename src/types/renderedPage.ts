export interface RenderedPage {
  title: string;
  /** Confluence storage-format XHTML. */
  body: string;
  /** Stable across runs while the object and its diagram are unchanged. */
  fingerprint: string;
  attachmentName: string;
}

export type PublishAction = "created" | "updated" | "unchanged" | "dry-run";

export interface PublishOutcome {
  /** Null only when nothing was published (dry run of a page that does not exist yet). */
  pageId: string | null;
  action: PublishAction;
  version: number | null;
  url: string | null;
}
