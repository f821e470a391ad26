import { MalformedRowError } from '../errors.js';
import { FeedName } from '../types/index.js';

const LINE_BREAK = /\r?\n/;

export const skipLines = (feed: FeedName, body: string, count: number) => {
  let rest = body;
  for (let line = 1; line <= count; line += 1) {
    const match = LINE_BREAK.exec(rest);
    if (!match) {
      if (line === count && rest.length > 0) {
        return '';
      }
      throw new MalformedRowError(feed, `Expected ${count} header lines`, line);
    }
    rest = rest.slice(match.index + match[0].length);
  }
  return rest;
};

export const splitLines = (body: string) => {
  const lines = body.split(LINE_BREAK);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
};
