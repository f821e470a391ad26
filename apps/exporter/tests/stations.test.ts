import { describe, expect, it, vi } from 'vitest';
import { MalformedFieldError, MalformedRowError } from '../src/errors.js';
import { parseStationFeed } from '../src/parsers/stations.js';
import { StationTypes } from '../src/types/index.js';

const HEADER = 'idImpianto;Gestore;Bandiera;Tipo Impianto;Nome Impianto;Indirizzo;Comune;Provincia;Latitudine;Longitudine\n';
const ROADSIDE = '101;ROSSI SRL;Agip Eni;Stradale;ROSSI CARBURANTI;VIA ROMA 1;MILANO;MI;45.4642;9.1900';
const MOTORWAY =
  '202;BIANCHI SNC;Q8;Autostradale;AREA SERVIZIO NORD;A1 KM 10;A1 KM 10 DIR NORD;LODI;LO;45.3136;9.5036';

const createLogger = () => ({ log: vi.fn(), warn: vi.fn(), error: vi.fn() });

describe('parseStationFeed', () => {
  it('maps a ten field row onto a station', () => {
    const stations = parseStationFeed(`${HEADER}${ROADSIDE}\n`, { logger: createLogger() });

    expect([...stations.keys()]).toEqual([101]);
    expect(stations.get(101)).toEqual({
      id: 101,
      operator: 'ROSSI SRL',
      brand: 'Agip Eni',
      type: 'Stradale',
      name: 'ROSSI CARBURANTI',
      address: 'VIA ROMA 1',
      municipality: 'MILANO',
      province: 'MI',
      latitude: '45.4642',
      longitude: '9.1900'
    });
  });

  // Rows with a repeated address keep the first copy only; the second
  // address variant is dropped rather than merged.
  it('keeps the first address of an eleven field row', () => {
    const stations = parseStationFeed(`${HEADER}${MOTORWAY}\n`, { logger: createLogger() });

    expect(stations.get(202)?.type).toBe(StationTypes.Motorway);
    expect(stations.get(202)).toEqual({
      id: 202,
      operator: 'BIANCHI SNC',
      brand: 'Q8',
      type: 'Autostradale',
      name: 'AREA SERVIZIO NORD',
      address: 'A1 KM 10',
      municipality: 'LODI',
      province: 'LO',
      latitude: '45.3136',
      longitude: '9.5036'
    });
  });

  it('keeps the later row when an identifier repeats', () => {
    const logger = createLogger();
    const renamed = '101;VERDI SPA;Tamoil;Stradale;VERDI EXPRESS;VIA MILANO 2;MONZA;MB;45.58;9.27';
    const stations = parseStationFeed(`${HEADER}${ROADSIDE}\n${renamed}\n`, { logger });

    expect(stations.size).toBe(1);
    expect(stations.get(101)).toEqual({
      id: 101,
      operator: 'VERDI SPA',
      brand: 'Tamoil',
      type: 'Stradale',
      name: 'VERDI EXPRESS',
      address: 'VIA MILANO 2',
      municipality: 'MONZA',
      province: 'MB',
      latitude: '45.58',
      longitude: '9.27'
    });
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      "Found duplicate station ID 101 of type 'Stradale' on line 3, keeping the later row"
    );
  });

  it('skips empty rows with a warning', () => {
    const logger = createLogger();
    const stations = parseStationFeed(`${HEADER}${ROADSIDE}\n\n${MOTORWAY}\n`, { logger });

    expect([...stations.keys()]).toEqual([101, 202]);
    expect(logger.warn).toHaveBeenCalledWith('Skipping empty station row on line 3');
  });

  it('keeps stray quote characters verbatim', () => {
    const row = '303;NERI;Esso;Stradale;BAR "SPORT;VIA "DANTE 4;TORINO;TO;45.07;7.68';
    const stations = parseStationFeed(`${HEADER}${row}\n`, { logger: createLogger() });

    expect(stations.get(303)?.name).toBe('BAR "SPORT');
    expect(stations.get(303)?.address).toBe('VIA "DANTE 4');
  });

  it('passes unknown station types through', () => {
    const row = '404;LAGO SRL;Pompe Bianche;Lacustre;PONTILE;MOLO 1;COMO;CO;45.81;9.08';
    const stations = parseStationFeed(`${HEADER}${row}`, { logger: createLogger() });

    expect(stations.get(404)?.type).toBe('Lacustre');
    expect(Object.values(StationTypes)).not.toContain('Lacustre');
  });

  it('honours a custom number of header lines', () => {
    const stations = parseStationFeed(`Estrazione del 2024-03-05\n${HEADER}${ROADSIDE}\n`, {
      headerLines: 2,
      logger: createLogger()
    });

    expect([...stations.keys()]).toEqual([101]);
  });

  it.each([9, 12])('aborts the table when a row has %i fields', (count) => {
    const row = ['505', ...Array.from({ length: count - 1 }, (_, index) => `f${index}`)].join(';');

    expect(() => parseStationFeed(`${HEADER}${ROADSIDE}\n${row}\n`, { logger: createLogger() })).toThrowError(
      new MalformedRowError('stations', `Expected 10 or 11 fields, got ${count}`, 3)
    );
  });

  it('aborts the table when an identifier is not numeric', () => {
    const row = 'X12;ROSSI SRL;Agip Eni;Stradale;ROSSI;VIA ROMA 1;MILANO;MI;45.46;9.19';

    expect(() => parseStationFeed(`${HEADER}${row}\n`, { logger: createLogger() })).toThrowError(
      MalformedFieldError
    );
  });

  it('fails when the header line is missing', () => {
    expect(() => parseStationFeed('', { logger: createLogger() })).toThrowError(MalformedRowError);
  });
});
