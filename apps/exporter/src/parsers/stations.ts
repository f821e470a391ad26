import {
  FEED_DELIMITER,
  STATION_FIELD_COUNT,
  STATION_FIELD_COUNT_WITH_DUPLICATE_ADDRESS,
  STATION_HEADER_LINES
} from '../constants/feeds.js';
import { MalformedFieldError, MalformedRowError } from '../errors.js';
import { Logger, Station, StationTable } from '../types/index.js';
import { parseInteger } from '../utils/fields.js';
import { skipLines, splitLines } from './lines.js';

export type StationFeedOptions = {
  headerLines?: number;
  logger?: Logger;
};

// Rows with the duplicated address column keep the first copy.
export const parseStationRow = (items: string[], line: number): Station => {
  if (items.length !== STATION_FIELD_COUNT && items.length !== STATION_FIELD_COUNT_WITH_DUPLICATE_ADDRESS) {
    throw new MalformedRowError(
      'stations',
      `Expected ${STATION_FIELD_COUNT} or ${STATION_FIELD_COUNT_WITH_DUPLICATE_ADDRESS} fields, got ${items.length}`,
      line
    );
  }

  const id = parseInteger(items[0]);
  if (id === null) {
    throw new MalformedFieldError('stations', 'station id', items[0], line);
  }

  const offset = items.length - STATION_FIELD_COUNT;
  const [, operator, brand, type, name, address] = items;
  const [municipality, province, latitude, longitude] = items.slice(6 + offset);

  return { id, operator, brand, type, name, address, municipality, province, latitude, longitude };
};

// No quote handling: the feed has stray quotes that quote-aware readers reject.
export const parseStationFeed = (body: string, options: StationFeedOptions = {}): StationTable => {
  const { headerLines = STATION_HEADER_LINES, logger = console } = options;
  const lines = splitLines(skipLines('stations', body, headerLines));
  const stations: StationTable = new Map();

  lines.forEach((text, index) => {
    const line = headerLines + index + 1;
    if (!text.trim()) {
      logger.warn(`Skipping empty station row on line ${line}`);
      return;
    }

    const station = parseStationRow(text.split(FEED_DELIMITER), line);
    if (stations.has(station.id)) {
      logger.warn(`Found duplicate station ID ${station.id} of type '${station.type}' on line ${line}, keeping the later row`);
    }
    stations.set(station.id, station);
  });

  return stations;
};
