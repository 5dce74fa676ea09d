import { describe, expect, it } from 'vitest';

import { EMPTY_ASSET_GUID } from '../../base/ids.js';
import {
  base64BlobSchema,
  barricadeSaveSchema,
  encodeBase64Blob,
  paintBytesSchema,
  vehicleSaveSchemaV1,
} from '../vehicle-save.js';

const createSave = (overrides: Record<string, unknown> = {}) => ({
  version: 1,
  definitionId: 1,
  definitionGuid: '11111111-1111-4111-8111-111111111111',
  instanceId: 12,
  skinId: 0,
  mythicId: 0,
  roadPosition: 0,
  health: 100,
  fuel: 50,
  batteryCharge: 0,
  owner: '76561198000000001',
  group: '0',
  tires: [true, false],
  turrets: ['AQID', ''],
  cargo: { width: 0, height: 0 },
  barricades: [],
  structures: [],
  position: { x: 0, y: 0, z: 0 },
  rotation: { x: 0, y: 0, z: 0, w: 1 },
  paintColor: [0, 0, 0, 0],
  ...overrides,
});

describe('vehicleSaveSchemaV1', () => {
  it('decodes blobs and identities', () => {
    const save = vehicleSaveSchemaV1.parse(createSave());

    expect(save.savedAt).toBe(0);
    expect(save.owner).toBe(76561198000000001n);
    expect(save.turrets.map((blob) => Array.from(blob))).toEqual([[1, 2, 3], []]);
    expect(save.cargo.items).toEqual([]);
  });

  it('rejects malformed blobs, paint and versions', () => {
    expect(vehicleSaveSchemaV1.safeParse(createSave({ turrets: ['***'] })).success).toBe(false);
    expect(vehicleSaveSchemaV1.safeParse(createSave({ paintColor: [0, 0, 0] })).success).toBe(
      false,
    );
    expect(vehicleSaveSchemaV1.safeParse(createSave({ version: 2 })).success).toBe(false);
    expect(vehicleSaveSchemaV1.safeParse(createSave({ savedAt: -1 })).success).toBe(false);
  });

  it('rejects unknown fields', () => {
    expect(vehicleSaveSchemaV1.safeParse(createSave({ extra: true })).success).toBe(false);
  });
});

describe('barricadeSaveSchema', () => {
  it('defaults the GUID and state of legacy entries', () => {
    const barricade = barricadeSaveSchema.parse({
      definitionId: 7,
      health: 10,
      owner: '1',
      group: '2',
      position: { x: 0, y: 0, z: 0 },
      rotation: { x: 0, y: 0, z: 0, w: 1 },
    });

    expect(barricade.definitionGuid).toBe(EMPTY_ASSET_GUID);
    expect(barricade.state.byteLength).toBe(0);
  });
});

describe('blob and paint helpers', () => {
  it('encodes blobs as standard base64', () => {
    expect(encodeBase64Blob(Uint8Array.of(255, 0, 128))).toBe('/wCA');
    expect(Array.from(base64BlobSchema.parse('/wCA'))).toEqual([255, 0, 128]);
  });

  it('encodes views over a larger buffer by their own bytes', () => {
    const backing = Uint8Array.of(1, 2, 3, 4);
    expect(encodeBase64Blob(backing.subarray(1, 3))).toBe('AgM=');
  });

  it('requires four paint bytes', () => {
    expect(paintBytesSchema.parse([1, 2, 3, 4])).toEqual([1, 2, 3, 4]);
    expect(paintBytesSchema.safeParse([1, 2, 3, 256]).success).toBe(false);
  });
});
