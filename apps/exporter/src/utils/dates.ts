import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';
import duration from 'dayjs/plugin/duration.js';
import utc from 'dayjs/plugin/utc.js';

dayjs.extend(utc);
dayjs.extend(customParseFormat);
dayjs.extend(duration);

const OBSERVATION_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4}) (\d{1,2}):(\d{2}):(\d{2})$/;
const DURATION_PATTERN = /^(?:(\d+)h)?(?:(\d+)m(?!s))?(?:(\d+)s)?(?:(\d+)ms)?$/;

const pad = (value: string) => value.padStart(2, '0');

// `D/M/YYYY H:mm:ss`, leading zeros optional. The feed carries no offset, so
// the wall-clock value is read as UTC.
export const parseObservationTime = (value: string): Date | null => {
  const match = value.match(OBSERVATION_PATTERN);
  if (!match) {
    return null;
  }

  const [, day, month, year, hour, minute, second] = match;
  const parsed = dayjs.utc(
    `${year}-${pad(month)}-${pad(day)} ${pad(hour)}:${minute}:${second}`,
    'YYYY-MM-DD HH:mm:ss',
    true
  );

  return parsed.isValid() ? parsed.toDate() : null;
};

export const formatObservationTime = (value: Date) => dayjs.utc(value).format('D/M/YYYY H:mm:ss');

export const toUnixSeconds = (value: Date) => dayjs(value).unix();

export const parseDuration = (value: string): number | null => {
  const trimmed = value.trim();
  const match = trimmed.match(DURATION_PATTERN);
  if (!trimmed || !match) {
    return null;
  }

  const [, hours, minutes, seconds, milliseconds] = match;
  return dayjs
    .duration({
      hours: Number(hours ?? 0),
      minutes: Number(minutes ?? 0),
      seconds: Number(seconds ?? 0),
      milliseconds: Number(milliseconds ?? 0)
    })
    .asMilliseconds();
};

export const formatDuration = (ms: number) => {
  const span = dayjs.duration(ms);
  const parts = [
    [Math.floor(span.asHours()), 'h'],
    [span.minutes(), 'm'],
    [span.seconds(), 's'],
    [span.milliseconds(), 'ms']
  ] as const;

  const formatted = parts
    .filter(([amount]) => amount > 0)
    .map(([amount, unit]) => `${amount}${unit}`)
    .join('');

  return formatted || '0s';
};
