import { z } from "zod";
import { pathExists, readJson, writeJson } from "../utils/fs";
import { nowUtcIsoSeconds } from "../utils/time";

const PageIndexEntrySchema = z.object({
  page_id: z.string().min(1),
  title: z.string().nullable().default(null),
  updated_at: z.string()
});

const PageIndexFileSchema = z.object({
  schema_version: z.literal("1.0"),
  pages: z.record(PageIndexEntrySchema)
});

export type PageIndexEntry = z.infer<typeof PageIndexEntrySchema>;

/**
 * Object id -> documentation page id, persisted between runs so that objects
 * whose schema does not name a page still converge to updates.
 */
export class PageIndex {
  private readonly entries: Map<string, PageIndexEntry>;
  private dirty = false;

  constructor(
    readonly filePath: string | null,
    entries: Record<string, PageIndexEntry> = {}
  ) {
    this.entries = new Map(Object.entries(entries));
  }

  static async load(filePath: string): Promise<PageIndex> {
    if (!(await pathExists(filePath))) {
      return new PageIndex(filePath);
    }
    const parsed = PageIndexFileSchema.safeParse(await readJson(filePath));
    if (!parsed.success) {
      throw new Error(`Page index ${filePath} is malformed: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    return new PageIndex(filePath, parsed.data.pages);
  }

  get(objectId: string): string | null {
    return this.entries.get(objectId)?.page_id ?? null;
  }

  record(objectId: string, pageId: string, title: string | null = null): void {
    const current = this.entries.get(objectId);
    if (current && current.page_id === pageId && current.title === title) return;
    this.entries.set(objectId, { page_id: pageId, title, updated_at: nowUtcIsoSeconds() });
    this.dirty = true;
  }

  get size(): number {
    return this.entries.size;
  }

  async save(): Promise<void> {
    if (!this.filePath || !this.dirty) return;
    const pages = Object.fromEntries(
      [...this.entries.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    );
    await writeJson(this.filePath, { schema_version: "1.0", pages });
    this.dirty = false;
  }
}
