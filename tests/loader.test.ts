import { afterEach, describe, expect, it } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import os from "os";
import path from "path";
import { loadObjectSchemas } from "../src/schema/loader";
import { PageIndex } from "../src/io/pageIndex";
import { ConfigurationError } from "../src/errors";

const schemasDir = path.join(process.cwd(), "fixtures", "schemas");

const tempDirs: string[] = [];

function tempDir(): string {
  const dir = mkdtempSync(path.join(os.tmpdir(), "objects-loader-"));
  tempDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) rmSync(dir, { recursive: true, force: true });
});

describe("loadObjectSchemas", () => {
  it("yields one descriptor per valid file and one error per malformed file", async () => {
    const { descriptors, errors } = await loadObjectSchemas(schemasDir);

    expect(descriptors.map((descriptor) => descriptor.sourceFile)).toEqual(["agreement.json", "buyer.json", "order.json"]);
    expect(errors.map((error) => error.sourceFile)).toEqual(["bad-name.json", "broken-json.json"]);
    expect(errors.every((error) => error.error.kind === "SchemaParseError")).toBe(true);
    expect(errors[1].error.message).toMatch(/^Invalid JSON: /);
    expect(errors[0].error.message).toContain("/name must match pattern");
  });

  it("derives ids, titles, page ids and diagram references", async () => {
    const { descriptors } = await loadObjectSchemas(schemasDir);
    const [agreement, buyer, order] = descriptors;

    expect(agreement.id).toBe("agreement");
    expect(agreement.title).toBe("Agreement");
    expect(agreement.pageId).toBe("2001");
    expect(agreement.diagramRef).toEqual({ fileKey: "FILEKEY1", nodeId: "10:1", nodeName: null });

    expect(buyer.title).toBe("Buyer");
    expect(buyer.pageId).toBeNull();
    expect(buyer.diagramRef).toEqual({ fileKey: "FILEKEY1", nodeId: null, nodeName: "Buyer diagram" });

    expect(order.id).toBe("order");
    expect(order.title).toBe("Purchase Order");
    expect(order.diagramRef).toBeNull();
  });

  it("fills page ids from the page index when the schema names none", async () => {
    const index = new PageIndex(null, {
      buyer: { page_id: "3003", title: "Buyer", updated_at: "2026-01-01T00:00:00Z" },
      agreement: { page_id: "9999", title: "Agreement", updated_at: "2026-01-01T00:00:00Z" }
    });
    const { descriptors } = await loadObjectSchemas(schemasDir, { pageIndex: index });

    expect(descriptors.find((descriptor) => descriptor.id === "buyer")?.pageId).toBe("3003");
    expect(descriptors.find((descriptor) => descriptor.id === "agreement")?.pageId).toBe("2001");
  });

  it("returns nothing for an empty directory", async () => {
    const result = await loadObjectSchemas(tempDir());
    expect(result).toEqual({ descriptors: [], errors: [] });
  });

  it("reports a second file declaring the same id", async () => {
    const dir = tempDir();
    writeFileSync(path.join(dir, "a.json"), JSON.stringify({ name: "shared" }));
    writeFileSync(path.join(dir, "b.json"), JSON.stringify({ name: "shared" }));

    const { descriptors, errors } = await loadObjectSchemas(dir);

    expect(descriptors.map((descriptor) => descriptor.sourceFile)).toEqual(["a.json"]);
    expect(errors).toHaveLength(1);
    expect(errors[0].error.message).toBe('Duplicate object id "shared" (already declared by a.json)');
  });

  it("treats unparseable diagram links as parse errors", async () => {
    const dir = tempDir();
    writeFileSync(path.join(dir, "x.json"), JSON.stringify({ diagram: "https://www.figma.com/design/KEY/Name" }));

    const { descriptors, errors } = await loadObjectSchemas(dir);

    expect(descriptors).toEqual([]);
    expect(errors[0].objectId).toBe("x");
    expect(errors[0].error.message).toBe("Could not extract node-id from URL: https://www.figma.com/design/KEY/Name");
  });

  it("normalizes node ids declared in object form", async () => {
    const dir = tempDir();
    writeFileSync(path.join(dir, "invoice.json"), JSON.stringify({ diagram: { fileKey: "K1", nodeId: "10-1" } }));

    const { descriptors } = await loadObjectSchemas(dir);

    expect(descriptors[0].diagramRef).toEqual({ fileKey: "K1", nodeId: "10:1", nodeName: null });
  });

  it("fails with a configuration error when the directory is missing", async () => {
    await expect(loadObjectSchemas(path.join(tempDir(), "missing"))).rejects.toBeInstanceOf(ConfigurationError);
  });
});
