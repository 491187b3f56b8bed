import type { PlatformObjectSchema } from "../schema/objectSchema";

export interface DiagramRef {
  fileKey: string | null;
  nodeId: string | null;
  nodeName: string | null;
}

export interface ObjectDescriptor {
  readonly id: string;
  readonly sourcePath: string;
  readonly sourceFile: string;
  readonly title: string;
  readonly schema: Readonly<PlatformObjectSchema>;
  /** Remote page id when the object has been synced before. */
  readonly pageId: string | null;
  readonly diagramRef: Readonly<DiagramRef> | null;
}
