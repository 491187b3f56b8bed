import * as cheerio from "cheerio";
import { SYNC_ANCHOR_PREFIX } from "../render/objectPage";

/**
 * Reads the fingerprint a previous sync left in the page's anchor macro, or
 * null when the page was not written by this tool.
 */
export function extractSyncFingerprint(storageBody: string): string | null {
  if (!storageBody) return null;
  const $ = cheerio.load(storageBody, { xml: true });
  const marker = $("ac\\:structured-macro[ac\\:name='anchor'] > ac\\:parameter")
    .toArray()
    .map((element) => $(element).text().trim())
    .find((value) => value.startsWith(SYNC_ANCHOR_PREFIX));
  return marker ? marker.slice(SYNC_ANCHOR_PREFIX.length) : null;
}
