import { z } from 'zod';
import { defineType } from '../../schema/descriptor.js';
import { metaSchema } from '../../schema/envelope.js';
import { countryEnum } from '../enums/country.js';

export const addressSchema = z.object({
  meta: metaSchema,
  street: z.string().optional(),
  houseNumber: z.string().optional(),
  postalCode: z.string().optional(),
  city: z.string().optional(),
  district: z.string().optional(),
  poBox: z.string().optional(),
  addressAddition: z.string().optional(),
  careOf: z.string().optional(),
  countryCode: countryEnum.schema.optional(),
});

export type Address = z.infer<typeof addressSchema>;

/** Postal address. `careOf` keeps its German wire name in both conventions. */
export const addressType = defineType({
  name: 'Address',
  germanName: 'Adresse',
  category: 'component',
  schema: addressSchema,
  german: {
    street: 'strasse',
    houseNumber: 'hausnummer',
    postalCode: 'postleitzahl',
    city: 'ort',
    district: 'ortsteil',
    poBox: 'postfach',
    addressAddition: 'adresszusatz',
    careOf: 'coErgaenzung',
    countryCode: 'landescode',
  },
  english: { careOf: 'coErgaenzung' },
});
