import type { z } from 'zod';

export type DefinitionKind = 'vehicle';

/**
 * Neither catalog key of a snapshot resolved. Restores cannot continue
 * without a definition.
 */
export class DefinitionNotFoundError extends Error {
  readonly kind: DefinitionKind;
  readonly guid: string;
  readonly legacyId: number;

  constructor(kind: DefinitionKind, guid: string, legacyId: number) {
    super(
      `No ${kind} definition found for guid "${guid}" or legacy id ${legacyId}.`,
    );
    this.name = 'DefinitionNotFoundError';
    this.kind = kind;
    this.guid = guid;
    this.legacyId = legacyId;
  }
}

export type VehicleSaveErrorCode =
  | 'INVALID_SHAPE'
  | 'UNSUPPORTED_VERSION'
  | 'NO_MIGRATION_PATH'
  | 'LIMIT_EXCEEDED';

export class VehicleSaveFormatError extends Error {
  constructor(
    message: string,
    public readonly code: VehicleSaveErrorCode,
    public readonly issues: readonly z.ZodIssue[] = [],
  ) {
    super(message);
    this.name = 'VehicleSaveFormatError';
  }
}
