/**
 * Address-based admission: a request is let in when the host it declares
 * matches an allowlist entry, ignoring case. No other credential is looked at.
 *
 * Instances are immutable; `merge` returns a new guard.
 */
export class HostGuard {
  private readonly allowed: ReadonlySet<string>;

  constructor(hosts: Iterable<string>) {
    const normalized = new Set<string>();
    for (const host of hosts) {
      const h = host.trim().toLowerCase();
      if (h) normalized.add(h);
    }
    this.allowed = normalized;
    Object.freeze(this);
  }

  authorize(declaredHost: string | undefined): boolean {
    if (!declaredHost) return false;
    return this.allowed.has(declaredHost.toLowerCase());
  }

  merge(hosts: Iterable<string>): HostGuard {
    return new HostGuard([...this.allowed, ...hosts]);
  }

  entries(): string[] {
    return [...this.allowed];
  }
}

/**
 * Host name part of an HTTP Host header: `abc.onion:80` -> `abc.onion`,
 * `[::1]:8080` -> `::1`. Returns undefined for a missing or empty header.
 */
export function hostFromHeader(header: string | undefined): string | undefined {
  if (!header) return undefined;
  const value = header.trim();

  if (value.startsWith('[')) {
    const end = value.indexOf(']');
    return end > 1 ? value.slice(1, end) : undefined;
  }

  const colon = value.indexOf(':');
  const host = colon === -1 ? value : value.slice(0, colon);
  return host || undefined;
}
