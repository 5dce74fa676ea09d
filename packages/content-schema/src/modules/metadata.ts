import { z } from 'zod';

import { catalogSlugSchema, semverSchema } from '../base/ids.js';

const TITLE_MAX_LENGTH = 96;

export const catalogMetadataSchema = z
  .object({
    id: catalogSlugSchema,
    version: semverSchema,
    title: z
      .string()
      .trim()
      .min(1, { message: 'Catalog titles must contain at least one character.' })
      .max(TITLE_MAX_LENGTH, {
        message: `Catalog titles must contain at most ${TITLE_MAX_LENGTH} characters.`,
      })
      .optional(),
  })
  .strict();

export type CatalogMetadata = z.infer<typeof catalogMetadataSchema>;
