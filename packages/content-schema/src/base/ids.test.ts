import { describe, expect, it } from 'vitest';

import {
  assetGuidSchema,
  catalogSlugSchema,
  EMPTY_ASSET_GUID,
  identitySchema,
  isEmptyAssetGuid,
  MAX_IDENTITY,
  normalizeAssetGuid,
  semverSchema,
} from './ids.js';

describe('ids', () => {
  it('normalizes asset GUIDs to the dashed lowercase form', () => {
    expect(assetGuidSchema.parse(' AAAAAAAA-bbbb-4CCC-8ddd-EEEEEEEEEEEE ')).toBe(
      'aaaaaaaa-bbbb-4ccc-8ddd-eeeeeeeeeeee',
    );
    expect(assetGuidSchema.parse('0123456789ABCDEF0123456789abcdef')).toBe(
      '01234567-89ab-cdef-0123-456789abcdef',
    );
    expect(assetGuidSchema.safeParse('not-a-guid').success).toBe(false);
  });

  it('normalizes GUIDs outside a schema', () => {
    expect(normalizeAssetGuid('AAAAAAAABBBBCCCCDDDDEEEEEEEEEEEE')).toBe(
      'aaaaaaaa-bbbb-cccc-dddd-eeeeeeeeeeee',
    );
    expect(normalizeAssetGuid(' Not-A-Guid ')).toBe('not-a-guid');
  });

  it('recognizes the empty GUID', () => {
    expect(isEmptyAssetGuid(EMPTY_ASSET_GUID)).toBe(true);
    expect(isEmptyAssetGuid('')).toBe(true);
    expect(isEmptyAssetGuid('11111111-1111-4111-8111-111111111111')).toBe(false);
  });

  it('normalizes catalog slugs to lowercase and enforces grammar', () => {
    expect(catalogSlugSchema.parse(' Desert-Vehicles ')).toBe('desert-vehicles');
    expect(catalogSlugSchema.safeParse('-leading-dash').success).toBe(false);
    expect(catalogSlugSchema.safeParse('has space').success).toBe(false);
  });

  it('cleans semantic versions', () => {
    expect(semverSchema.parse(' v1.2.3 ')).toBe('1.2.3');
    expect(semverSchema.safeParse('1.2').success).toBe(false);
  });

  it('parses identities from decimal strings, safe integers and bigints', () => {
    expect(identitySchema.parse('76561198000000001')).toBe(76561198000000001n);
    expect(identitySchema.parse(42)).toBe(42n);
    expect(identitySchema.parse(7n)).toBe(7n);
    expect(identitySchema.parse(MAX_IDENTITY.toString())).toBe(MAX_IDENTITY);
  });

  it('rejects identities outside the unsigned 64-bit range', () => {
    expect(identitySchema.safeParse('18446744073709551616').success).toBe(false);
    expect(identitySchema.safeParse(-1).success).toBe(false);
    expect(identitySchema.safeParse('-1').success).toBe(false);
    expect(identitySchema.safeParse(2 ** 60).success).toBe(false);
    expect(identitySchema.safeParse('12ab').success).toBe(false);
  });
});
