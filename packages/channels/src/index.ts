// packages/channels/src/index.ts
//
// Public exports for @chankv/channels.

export { ChannelService, type ChannelServiceOptions } from './service.js';
export { channelMetaCodec } from './codec.js';
export { createOperationContext, type OperationContext } from './context.js';

export {
  checkWriteConditions,
  hasConditions,
  normalizeEtag,
  parseEtagList,
  type WriteConditions,
} from './conditional.js';

export {
  parseChannel,
  assertChannelId,
  CHANNEL_ID_RE,
  MAX_NAME_LENGTH,
  MAX_TAGS,
  MIN_SEGMENT_DURATION,
  MAX_SEGMENT_DURATION,
  MIN_BITRATE,
} from './validate.js';

export {
  ChannelError,
  ChannelNotFoundError,
  InvalidChannelIdError,
  ChannelValidationError,
  PreconditionFailedError,
  type ErrorDetail,
} from './errors.js';

export {
  REGIONS,
  PUBLISH_FORMATS,
  DRM_SYSTEMS,
  FRAMERATES,
  type Region,
  type PublishFormat,
  type DrmSystem,
  type Framerate,
  type PublishPoint,
  type VideoEncoder,
  type Channel,
  type ChannelMeta,
  type PutChannelStatus,
  type PutChannelResult,
} from './types.js';
