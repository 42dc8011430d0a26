import { z } from 'zod';
import { defineType } from '../../schema/descriptor.js';
import { metaSchema } from '../../schema/envelope.js';
import { addressSchema } from '../components/address.js';
import { businessPartnerRoleEnum } from '../enums/business-partner-role.js';

export const businessPartnerSchema = z.object({
  meta: metaSchema,
  partnerId: z.string().optional(),
  name1: z.string().optional(),
  name2: z.string().optional(),
  name3: z.string().optional(),
  roles: z.array(businessPartnerRoleEnum.schema).optional(),
  address: addressSchema.optional(),
  commercialRegisterNumber: z.string().optional(),
  taxId: z.string().optional(),
  vatId: z.string().optional(),
});

export type BusinessPartner = z.infer<typeof businessPartnerSchema>;

export const businessPartnerType = defineType({
  name: 'BusinessPartner',
  germanName: 'Geschaeftspartner',
  category: 'record',
  schema: businessPartnerSchema,
  german: {
    partnerId: 'geschaeftspartnerId',
    name1: 'name1',
    name2: 'name2',
    name3: 'name3',
    roles: 'geschaeftspartnerrollen',
    address: 'adresse',
    commercialRegisterNumber: 'handelsregisternummer',
    taxId: 'steuernummer',
    vatId: 'umsatzsteuerId',
  },
});
