import { PublishFailed, SyncError, errorMessage } from "../errors";
import type { PageIndex } from "../io/pageIndex";
import { pageBackupPath } from "../io/paths";
import { DIAGRAM_CONTENT_TYPES, type DiagramArtifact } from "../types/diagramArtifact";
import type { Logger } from "../types/logger";
import type { ObjectDescriptor } from "../types/objectDescriptor";
import type { PublishOutcome, RenderedPage } from "../types/renderedPage";
import { writeText } from "../utils/fs";
import type { DocumentationClient, RemoteAttachment, RemotePage } from "./provider";
import { extractSyncFingerprint } from "./storage";

/** Capability the sync pipeline needs from the documentation side. */
export interface PageSink {
  upsertPage(descriptor: ObjectDescriptor, artifact: DiagramArtifact, page: RenderedPage): Promise<PublishOutcome>;
}

export interface PublisherOptions {
  client: DocumentationClient;
  spaceKey: string;
  parentPageId?: string | null;
  pageIndex?: PageIndex;
  /** When set, the current body of every page is saved here before it is overwritten. */
  backupDir?: string | null;
  /** Publish even when the page already carries the same fingerprint. */
  force?: boolean;
  logger?: Logger;
}

export function diagramComment(artifact: DiagramArtifact): string {
  return `diagram-sha256:${artifact.fingerprint}`;
}

export class DocumentationPublisher implements PageSink {
  private readonly client: DocumentationClient;
  private readonly logger: Logger;

  constructor(private readonly options: PublisherOptions) {
    this.client = options.client;
    this.logger = options.logger ?? console;
  }

  async upsertPage(
    descriptor: ObjectDescriptor,
    artifact: DiagramArtifact,
    page: RenderedPage
  ): Promise<PublishOutcome> {
    try {
      return await this.publish(descriptor, artifact, page);
    } catch (error) {
      if (error instanceof SyncError) throw error;
      throw new PublishFailed(`Publishing "${descriptor.id}" failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async locate(descriptor: ObjectDescriptor, page: RenderedPage): Promise<RemotePage | null> {
    if (descriptor.pageId) {
      const remote = await this.client.getPage(descriptor.pageId);
      if (!remote) {
        throw new PublishFailed(
          `Page ${descriptor.pageId} recorded for "${descriptor.id}" does not exist; fix the schema's page reference or remove it from the page index`
        );
      }
      return remote;
    }
    return this.client.findPageByTitle(this.options.spaceKey, page.title);
  }

  private async uploadDiagram(
    pageId: string,
    artifact: DiagramArtifact,
    page: RenderedPage,
    existing: RemoteAttachment | null
  ): Promise<void> {
    this.logger.log(
      `[${artifact.objectId}] ${existing ? "adding a version to" : "uploading"} attachment ${page.attachmentName} on page ${pageId}`
    );
    await this.client.uploadAttachment({
      pageId,
      attachmentId: existing?.id ?? null,
      filename: page.attachmentName,
      contentType: DIAGRAM_CONTENT_TYPES[artifact.format],
      bytes: artifact.bytes,
      comment: diagramComment(artifact)
    });
  }

  private async publish(
    descriptor: ObjectDescriptor,
    artifact: DiagramArtifact,
    page: RenderedPage
  ): Promise<PublishOutcome> {
    const remote = await this.locate(descriptor, page);

    if (!remote) {
      this.logger.log(`[${descriptor.id}] creating page "${page.title}" in space ${this.options.spaceKey}`);
      const created = await this.client.createPage({
        spaceKey: this.options.spaceKey,
        title: page.title,
        body: page.body,
        parentId: this.options.parentPageId ?? null
      });
      this.options.pageIndex?.record(descriptor.id, created.id, created.title);
      await this.uploadDiagram(created.id, artifact, page, null);
      return { pageId: created.id, action: "created", version: created.version, url: created.url };
    }

    this.options.pageIndex?.record(descriptor.id, remote.id, remote.title);
    const existing = await this.client.findAttachment(remote.id, page.attachmentName);

    const declaredTitle = descriptor.schema.title;
    const unchanged =
      extractSyncFingerprint(remote.body) === page.fingerprint &&
      existing?.comment === diagramComment(artifact) &&
      (declaredTitle === undefined || declaredTitle === remote.title);
    if (unchanged && !this.options.force) {
      this.logger.log(`[${descriptor.id}] page ${remote.id} is up to date`);
      return { pageId: remote.id, action: "unchanged", version: remote.version, url: remote.url };
    }

    if (this.options.backupDir) {
      await writeText(pageBackupPath(this.options.backupDir, descriptor.id, remote.id, remote.version), remote.body);
    }

    await this.uploadDiagram(remote.id, artifact, page, existing);

    // A title edited on the platform is kept unless the schema declares one.
    const title = descriptor.schema.title ?? remote.title;
    this.logger.log(`[${descriptor.id}] updating page ${remote.id} to version ${remote.version + 1}`);
    const updated = await this.client.updatePage({
      id: remote.id,
      title,
      body: page.body,
      version: remote.version + 1
    });
    this.options.pageIndex?.record(descriptor.id, updated.id, updated.title);
    return { pageId: updated.id, action: "updated", version: updated.version, url: updated.url };
  }
}
