import type { DiagramFormat } from "../types/diagramArtifact";

export interface DesignNode {
  id: string;
  name: string;
  type: string;
}

export interface ExportRequest {
  fileKey: string;
  nodeId: string;
  format: DiagramFormat;
  scale: number;
}

/** Design-tool operations the diagram fetcher relies on. */
export interface DesignToolClient {
  name: string;
  /** Resolves to null when the file has no node with that id. */
  findNodeById(fileKey: string, nodeId: string): Promise<DesignNode | null>;
  /** Top-level frames whose name matches exactly. */
  findNodesByName(fileKey: string, name: string): Promise<DesignNode[]>;
  /** Resolves to a short-lived download URL, or null when the node could not be rendered. */
  exportNode(request: ExportRequest): Promise<string | null>;
  download(url: string): Promise<Buffer>;
  nodeUrl(fileKey: string, nodeId: string): string;
}
