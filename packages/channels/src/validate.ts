// packages/channels/src/validate.ts
import {
  DRM_SYSTEMS,
  FRAMERATES,
  PUBLISH_FORMATS,
  REGIONS,
  type Channel,
  type PublishPoint,
  type VideoEncoder,
} from './types.js';
import { ChannelValidationError, InvalidChannelIdError, type ErrorDetail } from './errors.js';

export const CHANNEL_ID_RE = /^[a-zA-Z0-9_-]{2,60}$/;

export const MAX_NAME_LENGTH = 80;
export const MAX_TAGS = 10;
export const MIN_SEGMENT_DURATION = 2;
export const MAX_SEGMENT_DURATION = 60;
export const MIN_BITRATE = 300;

type Obj = Record<string, unknown>;

function isObject(x: unknown): x is Obj {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

export function assertChannelId(id: string): string {
  if (!CHANNEL_ID_RE.test(id)) throw new InvalidChannelIdError(id);
  return id;
}

/**
 * Collects problems while reading an untyped document. Readers return a
 * placeholder on failure so parsing can continue and report everything at once.
 */
class Reader {
  readonly problems: ErrorDetail[] = [];

  add(location: string, message: string, value?: unknown): void {
    this.problems.push(value === undefined ? { location, message } : { location, message, value });
  }

  object(value: unknown, loc: string, allowed: readonly string[]): Obj | null {
    if (!isObject(value)) {
      this.add(loc, 'expected object', value);
      return null;
    }
    for (const k of Object.keys(value)) {
      if (!allowed.includes(k)) this.add(`${loc}.${k}`, 'unexpected property');
    }
    return value;
  }

  present(obj: Obj, key: string, loc: string): boolean {
    if (obj[key] !== undefined) return true;
    this.add(loc, `expected required property ${key} to be present`);
    return false;
  }

  string(value: unknown, loc: string, maxLength?: number): string {
    if (typeof value !== 'string') {
      this.add(loc, 'expected string', value);
      return '';
    }
    // length in code points, not UTF-16 units
    if (maxLength !== undefined && [...value].length > maxLength) {
      this.add(loc, `expected length <= ${maxLength}`, value);
    }
    return value;
  }

  boolean(value: unknown, loc: string): boolean {
    if (typeof value !== 'boolean') {
      this.add(loc, 'expected boolean', value);
      return false;
    }
    return value;
  }

  integer(value: unknown, loc: string, range: { min?: number; max?: number; multipleOf?: number }): number {
    if (typeof value !== 'number' || !Number.isInteger(value)) {
      this.add(loc, 'expected integer', value);
      return 0;
    }
    if (range.min !== undefined && value < range.min) this.add(loc, `expected number >= ${range.min}`, value);
    if (range.max !== undefined && value > range.max) this.add(loc, `expected number <= ${range.max}`, value);
    if (range.multipleOf !== undefined && value % range.multipleOf !== 0) {
      this.add(loc, `expected number to be a multiple of ${range.multipleOf}`, value);
    }
    return value;
  }

  oneOf<T extends string | number>(value: unknown, options: readonly T[], loc: string): T {
    const found = options.find((o) => o === value);
    if (found === undefined) {
      this.add(loc, `expected value to be one of "${options.join(', ')}"`, value);
      return options[0];
    }
    return found;
  }

  array(value: unknown, loc: string, bounds: { minItems?: number; maxItems?: number }): unknown[] {
    if (!Array.isArray(value)) {
      this.add(loc, 'expected array', value);
      return [];
    }
    if (bounds.minItems !== undefined && value.length < bounds.minItems) {
      this.add(loc, `expected array length >= ${bounds.minItems}`);
    }
    if (bounds.maxItems !== undefined && value.length > bounds.maxItems) {
      this.add(loc, `expected array length <= ${bounds.maxItems}`);
    }
    return value;
  }

  uri(value: unknown, loc: string): string {
    const s = this.string(value, loc);
    if (typeof value !== 'string') return s;
    try {
      new URL(s);
    } catch {
      this.add(loc, 'expected string to be RFC 3986 uri', value);
    }
    return s;
  }
}

const CHANNEL_KEYS = ['name', 'region', 'on', 'segmentDuration', 'tags', 'videoEncoders', 'publishPoints'] as const;
const ENCODER_KEYS = ['id', 'width', 'height', 'bitrate', 'framerate'] as const;
const PUBLISH_POINT_KEYS = ['id', 'format', 'url', 'drms', 'headers'] as const;

function readEncoder(r: Reader, value: unknown, loc: string): VideoEncoder {
  const placeholder: VideoEncoder = { id: '', width: 0, height: 0, bitrate: 0, framerate: FRAMERATES[0] };
  const obj = r.object(value, loc, ENCODER_KEYS);
  if (!obj) return placeholder;

  for (const k of ENCODER_KEYS) r.present(obj, k, loc);
  const before = r.problems.length;

  const enc: VideoEncoder = {
    id: obj.id === undefined ? '' : r.string(obj.id, `${loc}.id`),
    width: obj.width === undefined ? 0 : r.integer(obj.width, `${loc}.width`, { min: 0, multipleOf: 2 }),
    height: obj.height === undefined ? 0 : r.integer(obj.height, `${loc}.height`, { min: 0, multipleOf: 2 }),
    bitrate:
      obj.bitrate === undefined ? 0 : r.integer(obj.bitrate, `${loc}.bitrate`, { min: MIN_BITRATE, max: 0xffff }),
    framerate: obj.framerate === undefined ? FRAMERATES[0] : r.oneOf(obj.framerate, FRAMERATES, `${loc}.framerate`),
  };

  if (r.problems.length === before && enc.width / enc.height !== 16 / 9) {
    r.add(loc, 'width and height must be in a 16:9 (1.777) aspect ratio', enc.width / enc.height);
  }
  return enc;
}

function readPublishPoint(r: Reader, value: unknown, loc: string): PublishPoint {
  const obj = r.object(value, loc, PUBLISH_POINT_KEYS);
  if (!obj) return { id: '', format: PUBLISH_FORMATS[0], url: '' };

  for (const k of ['id', 'format', 'url']) r.present(obj, k, loc);

  const point: PublishPoint = {
    id: obj.id === undefined ? '' : r.string(obj.id, `${loc}.id`),
    format: obj.format === undefined ? PUBLISH_FORMATS[0] : r.oneOf(obj.format, PUBLISH_FORMATS, `${loc}.format`),
    url: obj.url === undefined ? '' : r.uri(obj.url, `${loc}.url`),
  };

  if (obj.drms !== undefined) {
    const drms = r
      .array(obj.drms, `${loc}.drms`, {})
      .map((d, i) => r.oneOf(d, DRM_SYSTEMS, `${loc}.drms[${i}]`));
    if (drms.length) point.drms = drms;
  }

  if (obj.headers !== undefined) {
    if (!isObject(obj.headers)) {
      r.add(`${loc}.headers`, 'expected object', obj.headers);
    } else {
      const headers: Record<string, string> = Object.fromEntries(
        Object.entries(obj.headers).map(([k, v]): [string, string] => [k, r.string(v, `${loc}.headers.${k}`)]),
      );
      if (Object.keys(headers).length) point.headers = headers;
    }
  }

  return point;
}

/**
 * Validate an untyped channel document and return a clean copy. Throws
 * ChannelValidationError listing every problem found.
 */
export function parseChannel(value: unknown, loc = 'body'): Channel {
  const r = new Reader();
  const obj = r.object(value, loc, CHANNEL_KEYS);
  if (!obj) throw new ChannelValidationError(r.problems);

  for (const k of ['name', 'region', 'segmentDuration', 'videoEncoders']) r.present(obj, k, loc);

  const channel: Channel = {
    name: obj.name === undefined ? '' : r.string(obj.name, `${loc}.name`, MAX_NAME_LENGTH),
    region: obj.region === undefined ? REGIONS[0] : r.oneOf(obj.region, REGIONS, `${loc}.region`),
    segmentDuration:
      obj.segmentDuration === undefined
        ? 0
        : r.integer(obj.segmentDuration, `${loc}.segmentDuration`, {
            min: MIN_SEGMENT_DURATION,
            max: MAX_SEGMENT_DURATION,
          }),
    videoEncoders:
      obj.videoEncoders === undefined
        ? []
        : r
            .array(obj.videoEncoders, `${loc}.videoEncoders`, { minItems: 1 })
            .map((e, i) => readEncoder(r, e, `${loc}.videoEncoders[${i}]`)),
  };

  // false and empty optional members are dropped, so they hash the same as absent ones
  if (obj.on !== undefined && r.boolean(obj.on, `${loc}.on`)) channel.on = true;

  if (obj.tags !== undefined) {
    const tags = r
      .array(obj.tags, `${loc}.tags`, { maxItems: MAX_TAGS })
      .map((t, i) => r.string(t, `${loc}.tags[${i}]`));
    if (tags.length) channel.tags = tags;
  }

  if (obj.publishPoints !== undefined) {
    const points = r
      .array(obj.publishPoints, `${loc}.publishPoints`, {})
      .map((p, i) => readPublishPoint(r, p, `${loc}.publishPoints[${i}]`));
    if (points.length) channel.publishPoints = points;
  }

  if (r.problems.length) throw new ChannelValidationError(r.problems);
  return channel;
}
