import { z } from 'zod';
import { defineType } from './descriptor.js';
import { jsonValueSchema } from './json-value.js';

export const additionalAttributeSchema = z.object({
  name: z.string(),
  value: jsonValueSchema.optional(),
});

export type AdditionalAttribute = z.infer<typeof additionalAttributeSchema>;

/** Free-form name/value pair carried in `zusatzAttribute`. Has no envelope of its own. */
export const additionalAttributeType = defineType({
  name: 'AdditionalAttribute',
  germanName: 'ZusatzAttribut',
  category: 'component',
  schema: additionalAttributeSchema,
  german: { name: 'name', value: 'value' },
});

export const metaSchema = z.object({
  /** Type discriminator, e.g. `Zaehler` or `Meter`. */
  typ: z.string().optional(),
  /** BO4E schema version the record was written against. */
  version: z.string().optional(),
  /** External identifier. */
  id: z.string().optional(),
  additionalAttributes: z.array(additionalAttributeSchema).optional(),
});

export type Bo4eMeta = z.infer<typeof metaSchema>;

/**
 * The metadata envelope shared by every record and component.
 *
 * In memory it is the distinct `meta` sub-object; on the wire its
 * attributes sit flat beside the owner's own fields.
 */
export const metaEnvelope = defineType({
  name: 'Bo4eMeta',
  germanName: 'Bo4eMeta',
  category: 'envelope',
  schema: metaSchema,
  german: {
    typ: '_typ',
    version: '_version',
    id: '_id',
    additionalAttributes: 'zusatzAttribute',
  },
  english: { typ: '_typ', version: '_version', id: '_id' },
});
