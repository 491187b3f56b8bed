const PAGE_ID_IN_URL = /\/pages\/(\d+)(?:[/?#]|$)/;

/** Accepts a bare numeric id or a page URL such as ".../spaces/ENG/pages/12345/Title". */
export function parsePageId(reference: string): string {
  const trimmed = reference.trim();
  if (/^\d+$/.test(trimmed)) return trimmed;
  const match = PAGE_ID_IN_URL.exec(trimmed);
  if (!match) {
    throw new Error(`Could not extract a page id from: ${reference}`);
  }
  return match[1];
}
