import { Gauge, Registry } from 'prom-client';
import { JoinedTuple } from '../types/index.js';

export const PRICE_METRIC_NAME = 'fuel_price_observation';

export const PRICE_LABELS = [
  'station_id',
  'fuel_type',
  'self_service',
  'name',
  'type',
  'municipality',
  'province',
  'brand'
] as const;

export type PriceLabel = (typeof PRICE_LABELS)[number];

export interface PriceSink {
  observe(tuple: JoinedTuple): void;
}

export const createPriceGauge = (registry: Registry) =>
  new Gauge<PriceLabel>({
    name: PRICE_METRIC_NAME,
    help: 'Fuel prices published by the Italian fuel price observatory',
    labelNames: PRICE_LABELS,
    registers: [registry]
  });

export const toLabels = ({ record, name, type, municipality, province, brand }: JoinedTuple): Record<PriceLabel, string> => ({
  station_id: record.stationId.toString(10),
  fuel_type: record.fuelType,
  self_service: String(record.selfService),
  name,
  type,
  municipality,
  province,
  brand
});

export class PrometheusPriceSink implements PriceSink {
  constructor(private readonly gauge: Gauge<PriceLabel>) {}

  observe(tuple: JoinedTuple) {
    this.gauge.labels(toLabels(tuple)).set(tuple.record.price);
  }
}
