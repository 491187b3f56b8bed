export interface RemotePage {
  id: string;
  title: string;
  version: number;
  /** Storage-format body; empty when the platform did not return it. */
  body: string;
  url: string | null;
}

export interface RemoteAttachment {
  id: string;
  title: string;
  comment: string | null;
}

export interface CreatePageRequest {
  spaceKey: string;
  title: string;
  body: string;
  parentId?: string | null;
}

export interface UpdatePageRequest {
  id: string;
  title: string;
  body: string;
  /** Version number the update creates. */
  version: number;
}

export interface UploadAttachmentRequest {
  pageId: string;
  /** Set to add a new version of an existing attachment. */
  attachmentId?: string | null;
  filename: string;
  contentType: string;
  bytes: Buffer;
  comment: string;
}

/** Documentation-platform operations the publisher relies on. */
export interface DocumentationClient {
  name: string;
  /** Resolves to null when no page has that id. */
  getPage(pageId: string): Promise<RemotePage | null>;
  findPageByTitle(spaceKey: string, title: string): Promise<RemotePage | null>;
  createPage(request: CreatePageRequest): Promise<RemotePage>;
  updatePage(request: UpdatePageRequest): Promise<RemotePage>;
  findAttachment(pageId: string, filename: string): Promise<RemoteAttachment | null>;
  uploadAttachment(request: UploadAttachmentRequest): Promise<RemoteAttachment>;
}
