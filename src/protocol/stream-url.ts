/**
 * Derive the event-stream URL from the backend's HTTP base URL.
 * `http://user@host:port/anything?q#f` becomes `ws://user@host:port/ws`; https maps to wss.
 * Returns null when the base URL cannot be parsed.
 */
export function buildStreamUrl(apiUrl: string | undefined | null): string | null {
  if (!apiUrl || !apiUrl.trim()) {
    return null;
  }

  let url: URL;
  try {
    url = new URL(apiUrl.trim());
  } catch {
    return null;
  }

  if (!url.host) {
    return null;
  }

  url.protocol = url.protocol === 'https:' ? 'wss:' : 'ws:';
  // The URL setter ignores a switch away from a non-special scheme
  if (url.protocol !== 'ws:' && url.protocol !== 'wss:') {
    return null;
  }
  url.pathname = '/ws';
  url.search = '';
  url.hash = '';
  return url.toString();
}

/** Case-insensitive comparison; any other difference counts as a new target. */
export function sameStreamUrl(a: string | undefined, b: string | undefined): boolean {
  if (a === undefined || b === undefined) return false;
  return a.toLowerCase() === b.toLowerCase();
}
