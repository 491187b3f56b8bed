import type { DiagramRef } from "../types/objectDescriptor";

const FILE_KEY_PATTERN = /figma\.com\/(?:file|proto|design|board)\/([a-zA-Z0-9]+)/;
const NODE_ID_PATTERN = /[?&]node-id=(\d+%3A\d+|[\d:-]+)/i;

/** URL node ids use "-" (or an encoded ":"); the API wants "1:2". */
export function normalizeNodeId(nodeId: string): string {
  return decodeURIComponent(nodeId).replace(/-/g, ":");
}

export function parseDesignUrl(url: string): DiagramRef {
  const fileKeyMatch = FILE_KEY_PATTERN.exec(url);
  if (!fileKeyMatch) {
    throw new Error(`Could not extract a design file key from URL: ${url}`);
  }
  const nodeIdMatch = NODE_ID_PATTERN.exec(url);
  if (!nodeIdMatch) {
    throw new Error(`Could not extract node-id from URL: ${url}`);
  }
  return {
    fileKey: fileKeyMatch[1],
    nodeId: normalizeNodeId(nodeIdMatch[1]),
    nodeName: null
  };
}

export function designNodeUrl(baseWebUrl: string, fileKey: string, nodeId: string): string {
  return `${baseWebUrl}/design/${fileKey}?node-id=${nodeId.replace(/:/g, "-")}`;
}
