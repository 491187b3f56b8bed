import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { existsSync, mkdtempSync, rmSync } from "fs";
import os from "os";
import path from "path";
import type { DiagramSource } from "../src/design/fetcher";
import type { PageSink } from "../src/docs/publisher";
import { DiagramUnavailable, PublishFailed, SchemaParseError } from "../src/errors";
import { runSyncPipeline, type PageRenderer, type SyncPipelineInput } from "../src/sync/orchestrator";
import type { DiagramArtifact } from "../src/types/diagramArtifact";
import { silentLogger } from "../src/types/logger";
import type { ObjectDescriptor } from "../src/types/objectDescriptor";
import type { PublishOutcome, RenderedPage } from "../src/types/renderedPage";
import { writeBinary } from "../src/utils/fs";
import { sha256 } from "../src/utils/hash";
import { makeDescriptor } from "./support/descriptors";

class FakeDiagrams implements DiagramSource {
  readonly unavailable = new Set<string>();
  readonly fetched: string[] = [];
  inFlight = 0;
  maxInFlight = 0;
  onFetch: (descriptor: ObjectDescriptor) => void = () => undefined;

  async fetchDiagram(descriptor: ObjectDescriptor, stagingPath: string): Promise<DiagramArtifact> {
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      this.fetched.push(descriptor.id);
      this.onFetch(descriptor);
      await new Promise((resolve) => setTimeout(resolve, 5));
      if (this.unavailable.has(descriptor.id)) {
        throw new DiagramUnavailable(`Design node for ${descriptor.id} not found`);
      }
      const bytes = Buffer.from(`png:${descriptor.id}`);
      await writeBinary(stagingPath, bytes);
      return {
        objectId: descriptor.id,
        fileKey: "FILEKEY1",
        nodeId: "1:1",
        format: "png",
        bytes,
        fingerprint: sha256(bytes),
        path: stagingPath,
        sourceUrl: "https://www.figma.com/design/FILEKEY1?node-id=1-1"
      };
    } finally {
      this.inFlight -= 1;
    }
  }
}

class FakeSink implements PageSink {
  readonly published: string[] = [];
  readonly rejected = new Set<string>();
  readonly upToDate = new Set<string>();

  async upsertPage(descriptor: ObjectDescriptor, _artifact: DiagramArtifact, page: RenderedPage): Promise<PublishOutcome> {
    if (this.rejected.has(descriptor.id)) {
      throw new PublishFailed(`Publishing "${descriptor.id}" failed: Request failed (500)`);
    }
    this.published.push(`${descriptor.id}:${page.title}`);
    const action = this.upToDate.has(descriptor.id) ? "unchanged" : "created";
    return { pageId: `page-${descriptor.id}`, action, version: 1, url: null };
  }
}

const renderer: PageRenderer = (descriptor, artifact) => ({
  title: descriptor.title,
  body: `<p>${descriptor.id}</p>`,
  fingerprint: artifact.fingerprint,
  attachmentName: `${descriptor.id}-diagram.png`
});

let stagingRoot: string;
let diagrams: FakeDiagrams;
let sink: FakeSink;

beforeEach(() => {
  stagingRoot = mkdtempSync(path.join(os.tmpdir(), "objects-pipeline-"));
  diagrams = new FakeDiagrams();
  sink = new FakeSink();
});

afterEach(() => {
  rmSync(stagingRoot, { recursive: true, force: true });
});

function input(descriptors: ObjectDescriptor[], overrides: Partial<SyncPipelineInput> = {}): SyncPipelineInput {
  const stagingDir = path.join(stagingRoot, "diagrams");
  return {
    runId: "run-1",
    descriptors,
    fetcher: diagrams,
    renderer,
    publisher: sink,
    stagingPath: (descriptor) => path.join(stagingDir, `${descriptor.id}.png`),
    stagingDir,
    logger: silentLogger,
    ...overrides
  };
}

const objects = ["agreement", "buyer", "order"].map((id) => makeDescriptor({ id }));

describe("runSyncPipeline", () => {
  it("publishes every object and reports results in file order", async () => {
    const summary = await runSyncPipeline(input([objects[2], objects[0], objects[1]]));

    expect(summary.runId).toBe("run-1");
    expect(summary.aborted).toBe(false);
    expect(summary.counts).toEqual({ total: 3, succeeded: 3, skipped: 0, failed: 0 });
    expect(summary.results.map((result) => result.objectId)).toEqual(["agreement", "buyer", "order"]);
    expect(summary.results[0]).toEqual({
      objectId: "agreement",
      sourceFile: "agreement.json",
      status: "success",
      stage: "publish",
      kind: null,
      message: null,
      pageId: "page-agreement",
      action: "created"
    });
  });

  it("isolates a failing object and never publishes it", async () => {
    diagrams.unavailable.add("buyer");

    const summary = await runSyncPipeline(input(objects));

    expect(summary.counts).toEqual({ total: 3, succeeded: 2, skipped: 0, failed: 1 });
    expect(summary.results[1]).toMatchObject({
      objectId: "buyer",
      status: "failed",
      stage: "fetch",
      kind: "DiagramUnavailable",
      message: "Design node for buyer not found"
    });
    expect(sink.published).toEqual(["agreement:agreement", "order:order"]);
  });

  it("reports render errors at the render stage", async () => {
    const failingRenderer: PageRenderer = (descriptor, artifact) => {
      if (descriptor.id === "order") throw new Error("template exploded");
      return renderer(descriptor, artifact);
    };

    const summary = await runSyncPipeline(input(objects, { renderer: failingRenderer }));

    expect(summary.results[2]).toMatchObject({
      status: "failed",
      stage: "render",
      kind: "RenderFailed",
      message: 'Rendering "order" failed: template exploded'
    });
    expect(sink.published).toEqual(["agreement:agreement", "buyer:buyer"]);
  });

  it("reports publish errors at the publish stage", async () => {
    sink.rejected.add("agreement");

    const summary = await runSyncPipeline(input(objects));

    expect(summary.results[0]).toMatchObject({ status: "failed", stage: "publish", kind: "PublishFailed" });
    expect(summary.counts.failed).toBe(1);
  });

  it("counts unchanged pages as skipped", async () => {
    sink.upToDate.add("order");

    const summary = await runSyncPipeline(input(objects));

    expect(summary.results[2]).toMatchObject({
      status: "skipped",
      stage: "publish",
      kind: null,
      message: "content unchanged",
      action: "unchanged"
    });
    expect(summary.counts).toEqual({ total: 3, succeeded: 2, skipped: 1, failed: 0 });
  });

  it("includes files the loader rejected as skipped", async () => {
    const loadError = {
      sourcePath: "/schemas/broken.json",
      sourceFile: "broken.json",
      objectId: "broken",
      error: new SchemaParseError("/schemas/broken.json", "Invalid JSON: Unexpected end of JSON input")
    };

    const summary = await runSyncPipeline(input(objects, { loadErrors: [loadError] }));

    expect(summary.results.map((result) => result.sourceFile)).toEqual([
      "agreement.json",
      "broken.json",
      "buyer.json",
      "order.json"
    ]);
    expect(summary.results[1]).toEqual({
      objectId: "broken",
      sourceFile: "broken.json",
      status: "skipped",
      stage: "load",
      kind: "SchemaParseError",
      message: "Invalid JSON: Unexpected end of JSON input",
      pageId: null,
      action: null
    });
  });

  it("handles an empty object set", async () => {
    const summary = await runSyncPipeline(input([]));

    expect(summary.counts).toEqual({ total: 0, succeeded: 0, skipped: 0, failed: 0 });
    expect(summary.results).toEqual([]);
    expect(summary.aborted).toBe(false);
  });

  it("processes objects concurrently up to the limit", async () => {
    const many = ["a1", "a2", "a3", "a4", "a5"].map((id) => makeDescriptor({ id }));

    const summary = await runSyncPipeline(input(many, { concurrency: 2 }));

    expect(diagrams.maxInFlight).toBe(2);
    expect(summary.counts.succeeded).toBe(5);
    expect(summary.results.map((result) => result.objectId)).toEqual(["a1", "a2", "a3", "a4", "a5"]);
  });

  it("stops scheduling after an abort and marks the rest", async () => {
    const controller = new AbortController();
    diagrams.onFetch = () => controller.abort();

    const summary = await runSyncPipeline(input(objects, { signal: controller.signal }));

    expect(diagrams.fetched).toEqual(["agreement"]);
    expect(summary.aborted).toBe(true);
    expect(summary.results[0].status).toBe("success");
    expect(summary.results.slice(1)).toEqual([
      expect.objectContaining({ objectId: "buyer", status: "skipped", kind: "Aborted", message: "not processed: run aborted" }),
      expect.objectContaining({ objectId: "order", status: "skipped", kind: "Aborted", message: "not processed: run aborted" })
    ]);
  });

  it("removes staged diagrams once the run ends", async () => {
    await runSyncPipeline(input(objects));

    expect(existsSync(path.join(stagingRoot, "diagrams", "agreement.png"))).toBe(false);
    expect(existsSync(path.join(stagingRoot, "diagrams"))).toBe(false);
  });
});
