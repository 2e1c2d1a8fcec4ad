import { isIP } from 'node:net';

import type { CrawlScope } from '../../types.js';

// Second-level labels under which registrations happen one level deeper.
const COMPOUND_SUFFIXES = new Set([
  'co.uk',
  'org.uk',
  'ac.uk',
  'gov.uk',
  'com.au',
  'net.au',
  'org.au',
  'co.jp',
  'ne.jp',
  'or.jp',
  'co.nz',
  'co.kr',
  'co.in',
  'com.br',
  'com.cn',
]);

export function sameSubdomain(a: string | URL, b: string | URL): boolean {
  const aHost = hostnameOf(a);
  const bHost = hostnameOf(b);
  return aHost !== undefined && aHost === bHost;
}

export function sameRegistrableDomain(a: string | URL, b: string | URL): boolean {
  const aHost = hostnameOf(a);
  const bHost = hostnameOf(b);
  if (aHost === undefined || bHost === undefined) {
    return false;
  }

  return registrableDomain(aHost) === registrableDomain(bHost);
}

/**
 * `shop.example.com` -> `example.com`, `www.example.co.uk` -> `example.co.uk`.
 * IP addresses and single-label hosts are returned unchanged.
 */
export function registrableDomain(hostname: string): string {
  const host = hostname.toLowerCase().replace(/\.$/, '');
  if (isIP(host.replace(/^\[|\]$/g, '')) !== 0) {
    return host;
  }

  const labels = host.split('.');
  if (labels.length <= 2) {
    return host;
  }

  const lastTwo = labels.slice(-2).join('.');
  if (COMPOUND_SUFFIXES.has(lastTwo)) {
    return labels.slice(-3).join('.');
  }

  return lastTwo;
}

export function inScope(seed: string | URL, candidate: string | URL, scope: CrawlScope): boolean {
  switch (scope) {
    case 'unrestricted':
      return hostnameOf(candidate) !== undefined;
    case 'same-subdomain':
      return sameSubdomain(seed, candidate);
    case 'same-domain':
      return sameRegistrableDomain(seed, candidate);
  }
}

function hostnameOf(value: string | URL): string | undefined {
  try {
    const url = typeof value === 'string' ? new URL(value) : value;
    return url.hostname.toLowerCase() || undefined;
  } catch {
    return undefined;
  }
}
