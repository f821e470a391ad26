export type FeedName = 'prices' | 'stations';

export type PriceRecord = {
  stationId: number;
  fuelType: string;
  price: number;
  selfService: boolean;
  observedAt: Date;
};

export const StationTypes = {
  Roadside: 'Stradale',
  Motorway: 'Autostradale'
} as const;

// Upstream may add new kinds without notice, so unknown values pass through.
export type StationType = (typeof StationTypes)[keyof typeof StationTypes] | (string & {});

export type Station = {
  id: number;
  operator: string;
  brand: string;
  type: StationType;
  name: string;
  address: string;
  municipality: string;
  province: string;
  latitude: string;
  longitude: string;
};

export type StationTable = Map<number, Station>;

export type JoinedTuple = {
  record: PriceRecord;
  name: string;
  type: string;
  municipality: string;
  province: string;
  brand: string;
};

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;
