export type DiagramFormat = "png" | "jpg" | "svg" | "pdf";

export interface DiagramArtifact {
  objectId: string;
  fileKey: string;
  nodeId: string;
  format: DiagramFormat;
  bytes: Buffer;
  /** sha256 of `bytes` */
  fingerprint: string;
  /** Staging file; owned by the pipeline run for this object. */
  path: string;
  /** Design-tool link to the exported node. */
  sourceUrl: string;
}

export const DIAGRAM_CONTENT_TYPES: Record<DiagramFormat, string> = {
  png: "image/png",
  jpg: "image/jpeg",
  svg: "image/svg+xml",
  pdf: "application/pdf"
};
