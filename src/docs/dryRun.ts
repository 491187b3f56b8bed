import { renderedPagePath } from "../io/paths";
import type { DiagramArtifact } from "../types/diagramArtifact";
import type { Logger } from "../types/logger";
import type { ObjectDescriptor } from "../types/objectDescriptor";
import type { PublishOutcome, RenderedPage } from "../types/renderedPage";
import { writeText } from "../utils/fs";
import type { PageSink } from "./publisher";

/** Writes rendered pages to the staging directory instead of publishing them. */
export class DryRunPageSink implements PageSink {
  constructor(
    private readonly stagingDir: string,
    private readonly runId: string,
    private readonly logger: Logger = console
  ) {}

  async upsertPage(
    descriptor: ObjectDescriptor,
    _artifact: DiagramArtifact,
    page: RenderedPage
  ): Promise<PublishOutcome> {
    const outPath = renderedPagePath(this.stagingDir, this.runId, descriptor.id);
    await writeText(outPath, page.body);
    this.logger.log(`[${descriptor.id}] dry run: wrote ${outPath}`);
    return { pageId: descriptor.pageId, action: "dry-run", version: null, url: null };
  }
}
