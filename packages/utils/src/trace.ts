// packages/utils/src/trace.ts
import { randomBytes } from '@noble/hashes/utils.js';

import { bytesToHex } from './bytes.js';

// W3C trace-context `traceparent`: version-traceid-parentid-flags
export const TRACE_ID_RE = /^([0-9a-f]{2})-([0-9a-f]{32})-([0-9a-f]{16})-([0-9a-f]{2})$/;

export type TraceIdParts = {
  version: string;
  traceId: string;
  spanId: string;
  flags: string;
};

/** Fresh random trace ID, e.g. `00-4bf92f3577b34da6a3ce929d0e0e4736-00f067aa0ba902b7-00`. */
export function newTraceId(): string {
  const t = randomBytes(24);
  return `00-${bytesToHex(t.subarray(0, 16))}-${bytesToHex(t.subarray(16, 24))}-00`;
}

export function isTraceId(s: string): boolean {
  return TRACE_ID_RE.test(s);
}

export function parseTraceId(s: string): TraceIdParts {
  const m = TRACE_ID_RE.exec(s);
  if (!m) throw new Error(`invalid trace id "${s}"`);
  return { version: m[1], traceId: m[2], spanId: m[3], flags: m[4] };
}
