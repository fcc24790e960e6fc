import type { Channel } from '../types.js';

export function sampleChannel(overrides: Partial<Channel> = {}): Channel {
  return {
    name: 'test channel',
    on: true,
    region: 'us-west',
    segmentDuration: 6,
    publishPoints: [
      {
        id: 'pub1',
        format: 'hls',
        drms: ['fairplay'],
        url: 'http://example.com',
      },
    ],
    videoEncoders: [
      {
        id: 'hd',
        width: 1920,
        height: 1080,
        bitrate: 2000,
        framerate: 30,
      },
    ],
    ...overrides,
  };
}
