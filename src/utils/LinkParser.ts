import { LinkEntry } from '../types';
import { logger } from './logger';

const VIDEO_ID_PATTERN = /^[A-Za-z0-9_-]{11}$/;
const TOKEN_SEPARATORS = /[\s,]+/;
const WRAPPING_CHARS = /^["'<>[\](){}]+|["'<>[\](){}]+$/g;
const PATH_PREFIXES = new Set(['shorts', 'embed', 'live']);

export interface LinkParserOptions {
  /** Hosts whose links are accepted; subdomains match too */
  hosts?: string[];
  /** Host that serves single-segment short links (`https://<host>/<id>`) */
  shortHosts?: string[];
  /** Builds the canonical URL from a bare ID */
  canonicalUrl?: (id: string) => string;
}

/**
 * LinkParser - Turns free-form user input into canonical link entries
 * Invalid tokens are kept (isValid=false) so callers can report them
 */
export class LinkParser {
  private readonly hosts: string[];
  private readonly shortHosts: string[];
  private readonly canonicalUrl: (id: string) => string;

  constructor(options: LinkParserOptions = {}) {
    this.hosts = (options.hosts ?? ['youtube.com']).map((h) => h.toLowerCase());
    this.shortHosts = (options.shortHosts ?? ['youtu.be']).map((h) =>
      h.toLowerCase(),
    );
    this.canonicalUrl =
      options.canonicalUrl ??
      ((id) => `https://www.youtube.com/watch?v=${id}`);
  }

  /**
   * Split, validate and deduplicate raw text; first occurrence wins
   */
  parse(rawText: string): LinkEntry[] {
    const entries: LinkEntry[] = [];
    const seen = new Set<string>();

    for (const piece of (rawText || '').split(TOKEN_SEPARATORS)) {
      const token = piece.trim().replace(WRAPPING_CHARS, '');
      if (!token) continue;

      const id = this.extractId(token);
      const entry: LinkEntry = id
        ? {
            rawInput: token,
            canonicalId: id,
            url: this.canonicalUrl(id),
            isValid: true,
          }
        : { rawInput: token, canonicalId: token, isValid: false };

      if (seen.has(entry.canonicalId)) continue;
      seen.add(entry.canonicalId);
      entries.push(entry);
    }

    logger.debug('Parsed link input', {
      total: entries.length,
      valid: entries.filter((e) => e.isValid).length,
    });
    return entries;
  }

  /**
   * Bare video ID of a token, or null when the token is not a recognized link
   */
  extractId(token: string): string | null {
    const value = token.trim();
    if (!value) return null;

    if (VIDEO_ID_PATTERN.test(value)) {
      return value;
    }

    let url: URL;
    try {
      url = new URL(/^[a-z][a-z0-9+.-]*:\/\//i.test(value) ? value : `https://${value}`);
    } catch {
      return null;
    }

    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return null;
    }

    const hostname = url.hostname.toLowerCase();
    const segments = url.pathname.split('/').filter((s) => s.length > 0);

    if (this.matchesHost(hostname, this.shortHosts)) {
      const candidate = segments[0];
      return candidate && VIDEO_ID_PATTERN.test(candidate) ? candidate : null;
    }

    if (!this.matchesHost(hostname, this.hosts)) {
      return null;
    }

    if (url.pathname === '/watch') {
      const candidate = url.searchParams.get('v');
      return candidate && VIDEO_ID_PATTERN.test(candidate) ? candidate : null;
    }

    if (segments.length >= 2 && PATH_PREFIXES.has(segments[0])) {
      const candidate = segments[1];
      return VIDEO_ID_PATTERN.test(candidate) ? candidate : null;
    }

    return null;
  }

  private matchesHost(hostname: string, hosts: string[]): boolean {
    return hosts.some(
      (host) => hostname === host || hostname.endsWith(`.${host}`),
    );
  }
}

export function validEntries(entries: LinkEntry[]): LinkEntry[] {
  return entries.filter((entry) => entry.isValid);
}

export function invalidEntries(entries: LinkEntry[]): LinkEntry[] {
  return entries.filter((entry) => !entry.isValid);
}
