import { FeedName } from './types/index.js';

export class FeedError extends Error {
  constructor(
    readonly feed: FeedName,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class FetchError extends FeedError {
  constructor(feed: FeedName, url: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(feed, `Failed to fetch ${feed} feed from ${url}: ${reason}`, { cause });
  }
}

export class MalformedFieldError extends FeedError {
  constructor(
    feed: FeedName,
    readonly field: string,
    readonly value: string,
    readonly line: number
  ) {
    super(feed, `${field} is not valid on line ${line}: "${value}"`);
  }
}

export class MalformedRowError extends FeedError {
  constructor(
    feed: FeedName,
    message: string,
    readonly line: number,
    options?: { cause?: unknown }
  ) {
    super(feed, `${message} (line ${line})`, options);
  }
}
