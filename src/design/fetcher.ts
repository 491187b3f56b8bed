import { DiagramUnavailable, SyncError, errorMessage } from "../errors";
import type { DiagramArtifact, DiagramFormat } from "../types/diagramArtifact";
import type { Logger } from "../types/logger";
import type { ObjectDescriptor } from "../types/objectDescriptor";
import { writeBinary } from "../utils/fs";
import { sha256 } from "../utils/hash";
import { isRetryableHttpError } from "../utils/http";
import { DEFAULT_RETRY_POLICY, RetryPolicy, withRetry } from "../utils/retry";
import { parseDesignUrl } from "./nodeRef";
import type { DesignNode, DesignToolClient } from "./provider";

/** Capability the sync pipeline needs from the design side. */
export interface DiagramSource {
  fetchDiagram(descriptor: ObjectDescriptor, stagingPath: string): Promise<DiagramArtifact>;
}

export interface DiagramFetcherOptions {
  client: DesignToolClient;
  /** Searched by object name when a schema declares no file key. */
  defaultFileKey?: string | null;
  /** Design-tool URL exported for objects that have no diagram of their own. */
  placeholderUrl?: string | null;
  format?: DiagramFormat;
  scale?: number;
  retry?: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

interface ResolvedNode {
  fileKey: string;
  nodeId: string;
}

export class DiagramFetcher implements DiagramSource {
  private readonly client: DesignToolClient;
  private readonly format: DiagramFormat;
  private readonly scale: number;
  private readonly retry: RetryPolicy;
  private readonly logger: Logger;

  constructor(private readonly options: DiagramFetcherOptions) {
    this.client = options.client;
    this.format = options.format ?? "png";
    this.scale = options.scale ?? 2;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.logger = options.logger ?? console;
  }

  private call<T>(label: string, objectId: string, operation: () => Promise<T>): Promise<T> {
    return withRetry(() => operation(), this.retry, {
      isRetryable: isRetryableHttpError,
      sleep: this.options.sleep,
      onRetry: (error, attempt, delayMs) => {
        this.logger.warn(
          `[${objectId}] ${label} failed (attempt ${attempt} of ${this.retry.attempts}), retrying in ${delayMs}ms: ${errorMessage(error)}`
        );
      }
    });
  }

  private placeholder(descriptor: ObjectDescriptor, reason: string): ResolvedNode {
    if (!this.options.placeholderUrl) {
      throw new DiagramUnavailable(`${reason} for object "${descriptor.id}" and no placeholder diagram is configured`);
    }
    const ref = parseDesignUrl(this.options.placeholderUrl);
    if (!ref.fileKey || !ref.nodeId) {
      throw new DiagramUnavailable(`Placeholder diagram URL has no node: ${this.options.placeholderUrl}`);
    }
    this.logger.log(`[${descriptor.id}] ${reason}; using placeholder diagram`);
    return { fileKey: ref.fileKey, nodeId: ref.nodeId };
  }

  private async resolveNode(descriptor: ObjectDescriptor): Promise<ResolvedNode> {
    const ref = descriptor.diagramRef;
    const fileKey = ref?.fileKey ?? this.options.defaultFileKey ?? null;
    if (!fileKey) {
      return this.placeholder(descriptor, "No design file declared");
    }

    if (ref?.nodeId) {
      const nodeId = ref.nodeId;
      const node = await this.call("node lookup", descriptor.id, () => this.client.findNodeById(fileKey, nodeId));
      if (!node) {
        throw new DiagramUnavailable(`Design node ${nodeId} not found in file ${fileKey}`);
      }
      return { fileKey, nodeId: node.id };
    }

    const candidates = [ref?.nodeName, descriptor.id, descriptor.title].filter(
      (name): name is string => typeof name === "string" && name.length > 0
    );
    for (const name of new Set(candidates)) {
      const matches: DesignNode[] = await this.call("name lookup", descriptor.id, () =>
        this.client.findNodesByName(fileKey, name)
      );
      if (matches.length > 1) {
        this.logger.warn(`[${descriptor.id}] ${matches.length} frames named "${name}"; using ${matches[0].id}`);
      }
      if (matches.length > 0) {
        return { fileKey, nodeId: matches[0].id };
      }
    }
    throw new DiagramUnavailable(`No design frame named ${candidates.map((name) => `"${name}"`).join(" or ")} in file ${fileKey}`);
  }

  async fetchDiagram(descriptor: ObjectDescriptor, stagingPath: string): Promise<DiagramArtifact> {
    try {
      const { fileKey, nodeId } = await this.resolveNode(descriptor);
      this.logger.log(`[${descriptor.id}] exporting node ${nodeId} from ${fileKey} as ${this.format}@${this.scale}x`);

      const imageUrl = await this.call("export", descriptor.id, () =>
        this.client.exportNode({ fileKey, nodeId, format: this.format, scale: this.scale })
      );
      if (!imageUrl) {
        throw new DiagramUnavailable(`Design tool returned no image for node ${nodeId} in file ${fileKey}`);
      }

      const bytes = await this.call("download", descriptor.id, () => this.client.download(imageUrl));
      await writeBinary(stagingPath, bytes);

      return {
        objectId: descriptor.id,
        fileKey,
        nodeId,
        format: this.format,
        bytes,
        fingerprint: sha256(bytes),
        path: stagingPath,
        sourceUrl: this.client.nodeUrl(fileKey, nodeId)
      };
    } catch (error) {
      if (error instanceof SyncError) throw error;
      throw new DiagramUnavailable(`Diagram for "${descriptor.id}" unavailable: ${errorMessage(error)}`, {
        cause: error
      });
    }
  }
}
