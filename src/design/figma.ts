import { z } from "zod";
import { DiagramUnavailable } from "../errors";
import { assertOk, FetchLike, HttpError } from "../utils/http";
import { designNodeUrl, normalizeNodeId } from "./nodeRef";
import type { DesignNode, DesignToolClient, ExportRequest } from "./provider";

export interface FigmaConfig {
  apiToken: string;
  baseUrl?: string;
  webUrl?: string;
  fetch?: FetchLike;
}

const FigmaNodeSchema = z.object({
  id: z.string(),
  name: z.string(),
  type: z.string()
});

type FigmaNode = z.infer<typeof FigmaNodeSchema> & { children?: FigmaNode[] };

const FigmaTreeNodeSchema: z.ZodType<FigmaNode> = FigmaNodeSchema.extend({
  children: z.lazy(() => z.array(FigmaTreeNodeSchema)).optional()
});

const FileNodesResponseSchema = z.object({
  nodes: z.record(z.object({ document: FigmaNodeSchema }).nullable())
});

const FileResponseSchema = z.object({
  document: FigmaTreeNodeSchema
});

const ImagesResponseSchema = z.object({
  err: z.string().nullable().optional(),
  images: z.record(z.string().nullable())
});

const FRAME_TYPES = new Set(["FRAME", "COMPONENT", "COMPONENT_SET", "SECTION", "GROUP"]);

function toDesignNode(node: FigmaNode): DesignNode {
  return { id: node.id, name: node.name, type: node.type };
}

export class FigmaClient implements DesignToolClient {
  name = "figma";
  private readonly baseUrl: string;
  private readonly webUrl: string;
  private readonly apiToken: string;
  private readonly fetchImpl: FetchLike;
  // File trees are only read after they resolve; one request per file key.
  private readonly fileTrees = new Map<string, Promise<FigmaNode>>();

  constructor(config: FigmaConfig) {
    this.apiToken = config.apiToken;
    this.baseUrl = (config.baseUrl ?? "https://api.figma.com").replace(/\/+$/, "");
    this.webUrl = (config.webUrl ?? "https://www.figma.com").replace(/\/+$/, "");
    this.fetchImpl = config.fetch ?? fetch;
  }

  private async getJson(url: string): Promise<unknown> {
    const response = await this.fetchImpl(url, {
      headers: { "X-Figma-Token": this.apiToken, Accept: "application/json" }
    });
    if (response.status === 403) {
      const text = await response.text().catch(() => "");
      // Not retryable: a bad token or missing file access will not fix itself.
      throw new DiagramUnavailable(
        `Figma API returned 403 Forbidden for ${url}. The token is expired or incorrect, or it cannot read this file. ${text}`.trim()
      );
    }
    await assertOk(response, url);
    return response.json();
  }

  async findNodeById(fileKey: string, requestedId: string): Promise<DesignNode | null> {
    // Responses are keyed by the canonical "1:2" form.
    const nodeId = normalizeNodeId(requestedId);
    const url = `${this.baseUrl}/v1/files/${encodeURIComponent(fileKey)}/nodes?ids=${encodeURIComponent(nodeId)}&depth=1`;
    let data: unknown;
    try {
      data = await this.getJson(url);
    } catch (error) {
      if (error instanceof HttpError && error.status === 404) return null;
      throw error;
    }
    const parsed = FileNodesResponseSchema.parse(data);
    const entry = parsed.nodes[nodeId];
    return entry ? toDesignNode(entry.document) : null;
  }

  private fileTree(fileKey: string): Promise<FigmaNode> {
    let tree = this.fileTrees.get(fileKey);
    if (!tree) {
      const url = `${this.baseUrl}/v1/files/${encodeURIComponent(fileKey)}?depth=2`;
      tree = this.getJson(url).then((data) => FileResponseSchema.parse(data).document);
      // A failed lookup must not poison later attempts.
      tree.catch(() => this.fileTrees.delete(fileKey));
      this.fileTrees.set(fileKey, tree);
    }
    return tree;
  }

  async findNodesByName(fileKey: string, name: string): Promise<DesignNode[]> {
    const document = await this.fileTree(fileKey);
    const matches: DesignNode[] = [];
    for (const page of document.children ?? []) {
      for (const node of page.children ?? []) {
        if (FRAME_TYPES.has(node.type) && node.name === name) {
          matches.push(toDesignNode(node));
        }
      }
    }
    return matches;
  }

  async exportNode(request: ExportRequest): Promise<string | null> {
    const nodeId = normalizeNodeId(request.nodeId);
    const params = new URLSearchParams({
      ids: nodeId,
      format: request.format,
      scale: String(request.scale)
    });
    const url = `${this.baseUrl}/v1/images/${encodeURIComponent(request.fileKey)}?${params.toString()}`;
    const parsed = ImagesResponseSchema.parse(await this.getJson(url));
    if (parsed.err) {
      throw new DiagramUnavailable(`Figma could not render node ${nodeId}: ${parsed.err}`);
    }
    return parsed.images[nodeId] ?? null;
  }

  async download(url: string): Promise<Buffer> {
    const response = await this.fetchImpl(url);
    await assertOk(response, url);
    return Buffer.from(await response.arrayBuffer());
  }

  nodeUrl(fileKey: string, nodeId: string): string {
    return designNodeUrl(this.webUrl, fileKey, nodeId);
  }
}
