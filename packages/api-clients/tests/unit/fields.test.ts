/**
 * Tests for fields.ts
 */

import { describe, it, expect } from 'vitest';
import {
  ALL_FIELDS_MASK,
  FIELD_BITS,
  FIELD_NAMES,
  fieldsToMask,
  isFieldName,
  maskToFields,
  resolveBatchFields,
  resolveFields,
} from '@ipgeo/api-clients/fields';
import { ConfigError } from '@ipgeo/utils';

describe('field bits', () => {
  it('knows every ip-api field', () => {
    expect(FIELD_NAMES).toHaveLength(25);
    expect(FIELD_NAMES).toContain('asname');
    expect(FIELD_NAMES).toContain('hosting');
  });

  it('gives every field its own bit', () => {
    const bits = FIELD_NAMES.map((name) => FIELD_BITS[name]);
    expect(new Set(bits).size).toBe(25);
    expect(ALL_FIELDS_MASK).toBe(66846719);
  });

  it('recognises field names', () => {
    expect(isFieldName('countryCode')).toBe(true);
    expect(isFieldName('toString')).toBe(false);
    expect(isFieldName('planet')).toBe(false);
  });
});

describe('fieldsToMask', () => {
  it('ORs the bits of the named fields', () => {
    expect(fieldsToMask(['country', 'city', 'query'])).toBe(8209);
    expect(fieldsToMask(new Set(['status', 'message']))).toBe(49152);
  });

  it('lists every unknown name', () => {
    expect(() => fieldsToMask(['country', 'planet', 'moon'])).toThrow(
      'Invalid fields: planet, moon'
    );
  });
});

describe('maskToFields', () => {
  it('expands a mask in canonical order', () => {
    expect(maskToFields(8209)).toEqual(['country', 'city', 'query']);
  });

  it('expands the full mask to every field', () => {
    expect(maskToFields(ALL_FIELDS_MASK)).toEqual(FIELD_NAMES);
  });

  it.each([0, -1, 1.5, 1 << 18, 1 << 26])('rejects %d', (mask) => {
    expect(() => maskToFields(mask)).toThrow(ConfigError);
  });
});

describe('resolveFields', () => {
  it('joins names in caller order without duplicates', () => {
    expect(resolveFields(['query', 'country', 'query'])).toEqual({
      param: 'query,country',
      names: ['query', 'country'],
    });
  });

  it('sends masks as numbers', () => {
    expect(resolveFields(66846719)).toEqual({ param: '66846719', names: [...FIELD_NAMES] });
  });

  it('rejects an empty selection', () => {
    expect(() => resolveFields([])).toThrow('At least one field must be requested');
  });
});

describe('resolveBatchFields', () => {
  it('appends status and message to a name list', () => {
    expect(resolveBatchFields(['country', 'status'])).toEqual({
      param: 'country,status,message',
      names: ['country', 'status', 'message'],
    });
  });

  it('ORs the status bits into a mask', () => {
    expect(resolveBatchFields(8193)).toEqual({
      param: '57345',
      names: ['status', 'message', 'country', 'query'],
    });
  });

  it('validates the caller selection first', () => {
    expect(() => resolveBatchFields([])).toThrow('At least one field must be requested');
    expect(() => resolveBatchFields(0)).toThrow('Invalid fields bitmask: 0');
  });
});
