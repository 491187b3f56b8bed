export function nowUtcIsoSeconds(now: Date = new Date()): string {
  const iso = now.toISOString();
  return iso.replace(/\.\d{3}Z$/, "Z");
}

export function nowUtcIsoFileSafe(now: Date = new Date()): string {
  return nowUtcIsoSeconds(now).replace(/:/g, "-");
}

const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/** e.g. "Mar 04, 2026 at 09:05:00 UTC" */
export function formatLastUpdated(date: Date): string {
  const day = pad2(date.getUTCDate());
  const time = [date.getUTCHours(), date.getUTCMinutes(), date.getUTCSeconds()].map(pad2).join(":");
  return `${MONTHS[date.getUTCMonth()]} ${day}, ${date.getUTCFullYear()} at ${time} UTC`;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
