// packages/channels/src/types.ts

export const REGIONS = ['us-west', 'us-east'] as const;
export const PUBLISH_FORMATS = ['hls', 'dash'] as const;
export const DRM_SYSTEMS = ['fairplay', 'widevine', 'playready'] as const;
export const FRAMERATES = [30, 25, 29.97, 50, 60] as const;

export type Region = (typeof REGIONS)[number];
export type PublishFormat = (typeof PUBLISH_FORMATS)[number];
export type DrmSystem = (typeof DRM_SYSTEMS)[number];
export type Framerate = (typeof FRAMERATES)[number];

export type PublishPoint = {
  id: string;
  format: PublishFormat;
  url: string;
  drms?: DrmSystem[];
  headers?: Record<string, string>;
};

export type VideoEncoder = {
  id: string;
  width: number; // px, even
  height: number; // px, even; width:height must be 16:9
  bitrate: number; // kbps
  framerate: Framerate;
};

export type Channel = {
  name: string;
  region: Region;
  on?: boolean;
  segmentDuration: number; // seconds
  tags?: string[];
  videoEncoders: VideoEncoder[];
  publishPoints?: PublishPoint[];
};

/** Stored per channel id; also the list item shape. */
export type ChannelMeta = {
  id: string;
  etag: string; // hash(channel)
  lastModified: Date;
  channel: Channel;
};

export type PutChannelStatus = 'created' | 'updated' | 'not-modified';

export type PutChannelResult = {
  status: PutChannelStatus;
  etag: string;
  lastModified: Date;
};
