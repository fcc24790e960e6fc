// packages/channels/src/errors.ts

/** Where and why a request was rejected, e.g. `{ location: 'body.name', message: '...' }`. */
export type ErrorDetail = {
  location: string;
  message: string;
  value?: unknown;
};

/** Base class; `status` is the HTTP-style status an API layer would answer with. */
export class ChannelError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly details: ErrorDetail[] = [],
  ) {
    super(message);
    this.name = 'ChannelError';
  }
}

export class ChannelNotFoundError extends ChannelError {
  constructor(public readonly channelId: string) {
    super(`channel "${channelId}" not found`, 404);
    this.name = 'ChannelNotFoundError';
  }
}

export class InvalidChannelIdError extends ChannelError {
  constructor(channelId: string) {
    super(`invalid channel id "${channelId}" (allowed: [a-zA-Z0-9_-], 2-60 chars)`, 422, [
      { location: 'path.id', message: 'expected string to match pattern ^[a-zA-Z0-9_-]{2,60}$', value: channelId },
    ]);
    this.name = 'InvalidChannelIdError';
  }
}

export class ChannelValidationError extends ChannelError {
  constructor(details: ErrorDetail[]) {
    super(`validation failed: ${details.map((d) => `${d.location}: ${d.message}`).join('; ')}`, 422, details);
    this.name = 'ChannelValidationError';
  }
}

export class PreconditionFailedError extends ChannelError {
  constructor(details: ErrorDetail[]) {
    super(`precondition failed: ${details.map((d) => d.message).join('; ')}`, 412, details);
    this.name = 'PreconditionFailedError';
  }
}
