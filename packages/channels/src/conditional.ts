// packages/channels/src/conditional.ts
import type { ErrorDetail } from './errors.js';

/** Optimistic-concurrency guards for a write, as carried by HTTP conditional headers. */
export type WriteConditions = {
  ifMatch?: string[];
  ifNoneMatch?: string[];
  ifModifiedSince?: Date;
  ifUnmodifiedSince?: Date;
};

export function hasConditions(c: WriteConditions | undefined): boolean {
  if (!c) return false;
  return Boolean(c.ifMatch?.length || c.ifNoneMatch?.length || c.ifModifiedSince || c.ifUnmodifiedSince);
}

/** `"abc"` and `W/"abc"` both become `abc`. */
export function normalizeEtag(raw: string): string {
  let s = raw.trim();
  if (s.startsWith('W/')) s = s.slice(2);
  if (s.length >= 2 && s.startsWith('"') && s.endsWith('"')) s = s.slice(1, -1);
  return s;
}

/** Split a header-style list (`a, "b", W/"c"`) into bare etags. */
export function parseEtagList(raw: string | string[]): string[] {
  const parts = Array.isArray(raw) ? raw.flatMap((r) => r.split(',')) : raw.split(',');
  return parts.map(normalizeEtag).filter((s) => s.length > 0);
}

/**
 * Check write conditions against the current resource. `etag` is '' when the
 * resource does not exist (and `modified` is then the epoch). Returns one
 * detail per failed condition; empty means the write may proceed.
 */
export function checkWriteConditions(c: WriteConditions, etag: string, modified: Date): ErrorDetail[] {
  const failures: ErrorDetail[] = [];
  const exists = etag !== '';
  const found = exists ? `found resource with ETag ${etag}` : 'found no existing resource';
  const matches = (m: string) => m === etag || (m === '*' && exists);

  if (c.ifMatch?.length && !c.ifMatch.some(matches)) {
    failures.push({ location: 'request.headers.If-Match', message: `If-Match: ${c.ifMatch.join(', ')} but ${found}` });
  }

  if (c.ifNoneMatch?.length && c.ifNoneMatch.some(matches)) {
    failures.push({
      location: 'request.headers.If-None-Match',
      message: `If-None-Match: ${c.ifNoneMatch.join(', ')} but ${found}`,
    });
  }

  if (c.ifModifiedSince && modified.getTime() <= c.ifModifiedSince.getTime()) {
    failures.push({
      location: 'request.headers.If-Modified-Since',
      message: `If-Modified-Since: ${c.ifModifiedSince.toISOString()} but last modified ${modified.toISOString()}`,
    });
  }

  if (c.ifUnmodifiedSince && modified.getTime() > c.ifUnmodifiedSince.getTime()) {
    failures.push({
      location: 'request.headers.If-Unmodified-Since',
      message: `If-Unmodified-Since: ${c.ifUnmodifiedSince.toISOString()} but last modified ${modified.toISOString()}`,
    });
  }

  return failures;
}
