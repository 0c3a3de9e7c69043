/**
 * ip-api response fields and their numeric selector bits
 * (see the "fields" parameter in the ip-api documentation)
 */

import { ConfigError } from '@ipgeo/utils';

export const FIELD_BITS = {
  status: 1 << 14,
  message: 1 << 15,
  continent: 1 << 20,
  continentCode: 1 << 21,
  country: 1 << 0,
  countryCode: 1 << 1,
  region: 1 << 2,
  regionName: 1 << 3,
  city: 1 << 4,
  district: 1 << 19,
  zip: 1 << 5,
  lat: 1 << 6,
  lon: 1 << 7,
  timezone: 1 << 8,
  offset: 1 << 25,
  currency: 1 << 23,
  isp: 1 << 9,
  org: 1 << 10,
  as: 1 << 11,
  asname: 1 << 22,
  reverse: 1 << 12,
  mobile: 1 << 16,
  proxy: 1 << 17,
  hosting: 1 << 24,
  query: 1 << 13,
} as const;

export type FieldName = keyof typeof FIELD_BITS;

export const FIELD_NAMES: readonly FieldName[] = Object.keys(FIELD_BITS).filter(isFieldName);

/** Every field bit ip-api knows */
export const ALL_FIELDS_MASK = FIELD_NAMES.reduce((mask, name) => mask | FIELD_BITS[name], 0);

/**
 * Field names or a numeric bitmask
 */
export type FieldSelection = readonly string[] | ReadonlySet<string> | number;

export function isFieldName(name: string): name is FieldName {
  return Object.prototype.hasOwnProperty.call(FIELD_BITS, name);
}

function toFieldNames(fields: readonly string[] | ReadonlySet<string>): FieldName[] {
  const names = [...fields];
  const unknown = names.filter((name) => !isFieldName(name));
  if (unknown.length > 0) {
    throw new ConfigError(`Invalid fields: ${unknown.join(', ')}`, 'fields');
  }
  // Dedupe while keeping the caller's order
  return [...new Set(names.filter(isFieldName))];
}

export function fieldsToMask(fields: readonly string[] | ReadonlySet<string>): number {
  return toFieldNames(fields).reduce((mask, name) => mask | FIELD_BITS[name], 0);
}

export function maskToFields(mask: number): FieldName[] {
  assertMask(mask);
  return FIELD_NAMES.filter((name) => (mask & FIELD_BITS[name]) !== 0);
}

function assertMask(mask: number): void {
  if (!Number.isInteger(mask) || mask <= 0 || (mask & ~ALL_FIELDS_MASK) !== 0) {
    throw new ConfigError(`Invalid fields bitmask: ${mask}`, 'fields');
  }
}

export interface ResolvedFields {
  /** Value sent as the `fields` parameter */
  param: string;
  /** Names the result is restricted to */
  names: FieldName[];
}

/**
 * Validate a selection and produce both its wire form and the field names
 * it stands for. Names go over the wire comma-separated, masks as numbers.
 */
export function resolveFields(fields: FieldSelection): ResolvedFields {
  if (typeof fields === 'number') {
    return { param: String(fields), names: maskToFields(fields) };
  }

  const names = toFieldNames(fields);
  if (names.length === 0) {
    throw new ConfigError('At least one field must be requested', 'fields');
  }
  return { param: names.join(','), names };
}

const STATUS_FIELDS: readonly FieldName[] = ['status', 'message'];

/**
 * `resolveFields` for batch entries: `status` and `message` are always
 * requested so each entry keeps reporting its own outcome
 */
export function resolveBatchFields(fields: FieldSelection): ResolvedFields {
  const requested = resolveFields(fields);
  if (typeof fields === 'number') {
    return resolveFields(fields | FIELD_BITS.status | FIELD_BITS.message);
  }
  return resolveFields([...requested.names, ...STATUS_FIELDS]);
}
