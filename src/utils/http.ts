import { truncate } from "./text";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly url: string,
    readonly body: string
  ) {
    super(`Request to ${url} failed (${status})${body ? `: ${body}` : ""}`);
    this.name = "HttpError";
  }
}

export async function assertOk(response: Response, url: string): Promise<Response> {
  if (response.ok) return response;
  const text = await response.text().catch(() => "");
  throw new HttpError(response.status, url, truncate(text.trim(), 500));
}

export function isRetryableHttpError(error: unknown): boolean {
  if (error instanceof HttpError) {
    return error.status === 429 || error.status >= 500;
  }
  // fetch rejects with a TypeError on network failures
  return error instanceof TypeError;
}
