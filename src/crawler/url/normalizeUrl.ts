const DEFAULT_PORT_MAP: Record<string, string> = {
  'http:': '80',
  'https:': '443',
};

/**
 * Resolves `raw` against `base` and returns the canonical form used as the
 * frontier key, or null when the target is not an http(s) URL.
 *
 * Canonical form: lower-cased scheme and host, default port dropped, fragment
 * removed, trailing slashes trimmed from every path except the root.
 */
export function normalizeUrl(raw: string, base?: string | URL): string | null {
  try {
    const url = new URL(raw.trim(), base);

    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return null;
    }

    url.protocol = url.protocol.toLowerCase();
    url.hostname = url.hostname.toLowerCase();
    url.hash = '';

    removeDefaultPort(url);
    normalizePath(url);

    return url.toString();
  } catch {
    return null;
  }
}

function removeDefaultPort(url: URL): void {
  const defaultPort = DEFAULT_PORT_MAP[url.protocol];
  if (defaultPort && url.port === defaultPort) {
    url.port = '';
  }
}

function normalizePath(url: URL): void {
  if (url.pathname === '/') {
    return;
  }

  const trimmed = url.pathname.replace(/\/+$/, '');
  url.pathname = trimmed.length > 0 ? trimmed : '/';
}
