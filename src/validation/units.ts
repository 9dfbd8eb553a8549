/**
 * Units accepted on `::metric[unit=…]`, compared case-insensitively
 */
export const METRIC_UNITS: readonly string[] = [
  '%',
  'ms',
  's',
  'sec',
  'min',
  'h',
  'hr',
  'hours',
  'days',
  'weeks',
  'months',
  'years',
  'b',
  'kb',
  'mb',
  'gb',
  'tb',
  'bytes',
  'req/s',
  'rps',
  'qps',
  'ops/s',
  'fps',
  'usd',
  'eur',
  'gbp',
  '$',
  '€',
  '£',
  'x',
  'pts',
  'users',
  'items',
];
