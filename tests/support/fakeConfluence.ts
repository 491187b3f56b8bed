import { z } from "zod";
import type { FetchLike } from "../../src/utils/http";

export const CONFLUENCE_BASE = "https://docs.test/wiki";
export const SPACE_KEY = "OBJ";

export interface FakePage {
  id: string;
  spaceKey: string;
  title: string;
  version: number;
  body: string;
  parentId: string | null;
}

export interface FakeAttachment {
  id: string;
  pageId: string;
  title: string;
  comment: string;
  bytes: Buffer;
  versions: number;
}

export interface RecordedCall {
  method: string;
  path: string;
}

const CreateBodySchema = z.object({
  type: z.literal("page"),
  title: z.string(),
  space: z.object({ key: z.string() }),
  ancestors: z.array(z.object({ id: z.string() })).optional(),
  body: z.object({ storage: z.object({ value: z.string(), representation: z.literal("storage") }) })
});

const UpdateBodySchema = z.object({
  id: z.string(),
  title: z.string(),
  body: z.object({ storage: z.object({ value: z.string() }) }),
  version: z.object({ number: z.number() })
});

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

/** In-process stand-in for the Confluence Cloud REST v1 content API. */
export class FakeConfluence {
  readonly pages = new Map<string, FakePage>();
  readonly attachments: FakeAttachment[] = [];
  readonly calls: RecordedCall[] = [];
  private nextId = 1000;
  private readonly failures: { method: string; pattern: RegExp; status: number }[] = [];

  addPage(page: Partial<FakePage> & { title: string }): FakePage {
    const created: FakePage = {
      id: page.id ?? String(this.nextId++),
      spaceKey: page.spaceKey ?? SPACE_KEY,
      title: page.title,
      version: page.version ?? 1,
      body: page.body ?? "<p>hand written</p>",
      parentId: page.parentId ?? null
    };
    this.pages.set(created.id, created);
    return created;
  }

  /** Every matching request answers with `status`. */
  failOn(method: string, pattern: RegExp, status: number): this {
    this.failures.push({ method, pattern, status });
    return this;
  }

  writes(): RecordedCall[] {
    return this.calls.filter((call) => call.method !== "GET");
  }

  private content(page: FakePage): unknown {
    return {
      id: page.id,
      type: "page",
      title: page.title,
      version: { number: page.version },
      body: { storage: { value: page.body, representation: "storage" } },
      _links: { base: CONFLUENCE_BASE, webui: `/spaces/${page.spaceKey}/pages/${page.id}` }
    };
  }

  private attachmentJson(attachment: FakeAttachment): unknown {
    return {
      id: attachment.id,
      type: "attachment",
      title: attachment.title,
      metadata: { comment: attachment.comment },
      version: { number: attachment.versions }
    };
  }

  private async readUpload(init: RequestInit | undefined): Promise<{ filename: string; comment: string; bytes: Buffer }> {
    const form = init?.body;
    if (!(form instanceof FormData)) throw new Error("expected multipart body");
    const file = form.get("file");
    if (file === null || typeof file === "string") throw new Error("expected a file part");
    const comment = form.get("comment");
    return {
      filename: file.name,
      comment: typeof comment === "string" ? comment : "",
      bytes: Buffer.from(await file.arrayBuffer())
    };
  }

  fetch: FetchLike = async (url, init) => {
    const method = init?.method ?? "GET";
    const parsed = new URL(url);
    const path = parsed.pathname.replace(/^\/wiki\/rest\/api/, "");
    this.calls.push({ method, path });

    const failure = this.failures.find((entry) => entry.method === method && entry.pattern.test(path));
    if (failure) return json({ statusCode: failure.status, message: "injected failure" }, failure.status);

    const headers = new Headers(init?.headers);
    if (!headers.get("Authorization")?.startsWith("Basic ")) {
      return json({ statusCode: 401, message: "Unauthorized" }, 401);
    }

    if (path === "/content" && method === "GET") {
      const spaceKey = parsed.searchParams.get("spaceKey");
      const title = parsed.searchParams.get("title");
      const results = [...this.pages.values()]
        .filter((page) => page.spaceKey === spaceKey && page.title === title)
        .map((page) => this.content(page));
      return json({ results, size: results.length });
    }

    if (path === "/content" && method === "POST") {
      const body = CreateBodySchema.parse(JSON.parse(String(init?.body)));
      const duplicate = [...this.pages.values()].some(
        (page) => page.spaceKey === body.space.key && page.title === body.title
      );
      if (duplicate) return json({ statusCode: 400, message: "A page with this title already exists" }, 400);
      const page = this.addPage({
        title: body.title,
        spaceKey: body.space.key,
        body: body.body.storage.value,
        parentId: body.ancestors?.[0]?.id ?? null
      });
      return json(this.content(page));
    }

    const attachmentDataMatch = /^\/content\/(\d+)\/child\/attachment\/([^/]+)\/data$/.exec(path);
    if (attachmentDataMatch && method === "POST") {
      const attachment = this.attachments.find(
        (entry) => entry.pageId === attachmentDataMatch[1] && entry.id === attachmentDataMatch[2]
      );
      if (!attachment) return json({ statusCode: 404, message: "No attachment" }, 404);
      const upload = await this.readUpload(init);
      attachment.bytes = upload.bytes;
      attachment.comment = upload.comment;
      attachment.versions += 1;
      return json(this.attachmentJson(attachment));
    }

    const attachmentMatch = /^\/content\/(\d+)\/child\/attachment$/.exec(path);
    if (attachmentMatch) {
      const pageId = attachmentMatch[1];
      if (!this.pages.has(pageId)) return json({ statusCode: 404, message: "No page" }, 404);
      if (method === "GET") {
        const filename = parsed.searchParams.get("filename");
        const results = this.attachments
          .filter((entry) => entry.pageId === pageId && entry.title === filename)
          .map((entry) => this.attachmentJson(entry));
        return json({ results, size: results.length });
      }
      const upload = await this.readUpload(init);
      if (this.attachments.some((entry) => entry.pageId === pageId && entry.title === upload.filename)) {
        return json({ statusCode: 400, message: "Cannot add a new attachment with same file name" }, 400);
      }
      const attachment: FakeAttachment = {
        id: `att${this.nextId++}`,
        pageId,
        title: upload.filename,
        comment: upload.comment,
        bytes: upload.bytes,
        versions: 1
      };
      this.attachments.push(attachment);
      return json({ results: [this.attachmentJson(attachment)], size: 1 });
    }

    const pageMatch = /^\/content\/(\d+)$/.exec(path);
    if (pageMatch) {
      const page = this.pages.get(pageMatch[1]);
      if (!page) return json({ statusCode: 404, message: "No content found" }, 404);
      if (method === "GET") return json(this.content(page));
      if (method === "PUT") {
        const body = UpdateBodySchema.parse(JSON.parse(String(init?.body)));
        if (body.version.number !== page.version + 1) {
          return json({ statusCode: 409, message: "Version must be incremented on update" }, 409);
        }
        page.version = body.version.number;
        page.title = body.title;
        page.body = body.body.storage.value;
        return json(this.content(page));
      }
    }

    return json({ statusCode: 404, message: `Unknown endpoint ${method} ${path}` }, 404);
  };
}
