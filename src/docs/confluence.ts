import { z } from "zod";
import { assertOk, FetchLike, HttpError } from "../utils/http";
import type {
  CreatePageRequest,
  DocumentationClient,
  RemoteAttachment,
  RemotePage,
  UpdatePageRequest,
  UploadAttachmentRequest
} from "./provider";

export interface ConfluenceConfig {
  baseUrl: string;
  username: string;
  apiToken: string;
  fetch?: FetchLike;
}

const ContentSchema = z.object({
  id: z.string(),
  title: z.string(),
  version: z.object({ number: z.number().int() }),
  body: z.object({ storage: z.object({ value: z.string() }).optional() }).optional(),
  _links: z.object({ webui: z.string().optional(), base: z.string().optional() }).optional()
});

const ContentListSchema = z.object({
  results: z.array(ContentSchema)
});

const AttachmentSchema = z.object({
  id: z.string(),
  title: z.string(),
  metadata: z.object({ comment: z.string().optional() }).optional()
});

const AttachmentListSchema = z.object({
  results: z.array(AttachmentSchema)
});

type Content = z.infer<typeof ContentSchema>;
type Attachment = z.infer<typeof AttachmentSchema>;

interface RequestOptions {
  method?: "GET" | "POST" | "PUT";
  headers?: Record<string, string>;
  body?: string | FormData;
}

const PAGE_EXPAND = "body.storage,version";

export class ConfluenceClient implements DocumentationClient {
  name = "confluence";
  private readonly baseUrl: string;
  private readonly authorization: string;
  private readonly fetchImpl: FetchLike;

  constructor(config: ConfluenceConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.authorization = `Basic ${Buffer.from(`${config.username}:${config.apiToken}`).toString("base64")}`;
    this.fetchImpl = config.fetch ?? fetch;
  }

  private contentUrl(path: string): string {
    return `${this.baseUrl}/rest/api/content${path}`;
  }

  private async request(url: string, init: RequestOptions = {}): Promise<unknown> {
    const response = await this.fetchImpl(url, {
      method: init.method ?? "GET",
      headers: {
        Accept: "application/json",
        Authorization: this.authorization,
        ...init.headers
      },
      body: init.body
    });
    await assertOk(response, url);
    return response.json();
  }

  private toRemotePage(content: Content): RemotePage {
    const webui = content._links?.webui;
    const base = content._links?.base ?? this.baseUrl;
    return {
      id: content.id,
      title: content.title,
      version: content.version.number,
      body: content.body?.storage?.value ?? "",
      url: webui ? `${base}${webui}` : null
    };
  }

  private toRemoteAttachment(attachment: Attachment): RemoteAttachment {
    return {
      id: attachment.id,
      title: attachment.title,
      comment: attachment.metadata?.comment ?? null
    };
  }

  async getPage(pageId: string): Promise<RemotePage | null> {
    const url = this.contentUrl(`/${encodeURIComponent(pageId)}?expand=${PAGE_EXPAND}`);
    try {
      return this.toRemotePage(ContentSchema.parse(await this.request(url)));
    } catch (error) {
      if (error instanceof HttpError && error.status === 404) return null;
      throw error;
    }
  }

  async findPageByTitle(spaceKey: string, title: string): Promise<RemotePage | null> {
    const params = new URLSearchParams({ spaceKey, title, type: "page", expand: PAGE_EXPAND });
    const data = ContentListSchema.parse(await this.request(this.contentUrl(`?${params.toString()}`)));
    const [first] = data.results;
    return first ? this.toRemotePage(first) : null;
  }

  async createPage(request: CreatePageRequest): Promise<RemotePage> {
    const payload = {
      type: "page",
      title: request.title,
      space: { key: request.spaceKey },
      ...(request.parentId ? { ancestors: [{ id: request.parentId }] } : {}),
      body: { storage: { value: request.body, representation: "storage" } }
    };
    const data = await this.request(this.contentUrl(""), {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload)
    });
    return this.toRemotePage(ContentSchema.parse(data));
  }

  async updatePage(request: UpdatePageRequest): Promise<RemotePage> {
    const payload = {
      id: request.id,
      type: "page",
      title: request.title,
      body: { storage: { value: request.body, representation: "storage" } },
      version: { number: request.version }
    };
    const data = await this.request(this.contentUrl(`/${encodeURIComponent(request.id)}`), {
      method: "PUT",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload)
    });
    return this.toRemotePage(ContentSchema.parse(data));
  }

  async findAttachment(pageId: string, filename: string): Promise<RemoteAttachment | null> {
    const params = new URLSearchParams({ filename, expand: "version" });
    const url = this.contentUrl(`/${encodeURIComponent(pageId)}/child/attachment?${params.toString()}`);
    const data = AttachmentListSchema.parse(await this.request(url));
    const [first] = data.results;
    return first ? this.toRemoteAttachment(first) : null;
  }

  async uploadAttachment(request: UploadAttachmentRequest): Promise<RemoteAttachment> {
    const form = new FormData();
    form.append("file", new Blob([new Uint8Array(request.bytes)], { type: request.contentType }), request.filename);
    form.append("minorEdit", "true");
    form.append("comment", request.comment);

    const base = `/${encodeURIComponent(request.pageId)}/child/attachment`;
    const path = request.attachmentId ? `${base}/${encodeURIComponent(request.attachmentId)}/data` : base;
    const data = await this.request(this.contentUrl(path), {
      method: "POST",
      headers: { "X-Atlassian-Token": "no-check" },
      body: form
    });

    // Creating returns a result list, adding a version returns the attachment itself.
    const list = AttachmentListSchema.safeParse(data);
    if (list.success && list.data.results.length > 0) {
      return this.toRemoteAttachment(list.data.results[0]);
    }
    return this.toRemoteAttachment(AttachmentSchema.parse(data));
  }
}
