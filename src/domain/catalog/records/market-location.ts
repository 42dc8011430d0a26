import { z } from 'zod';
import { defineType } from '../../schema/descriptor.js';
import { metaSchema } from '../../schema/envelope.js';
import { addressSchema } from '../components/address.js';
import { customerTypeEnum } from '../enums/customer-type.js';
import { divisionEnum } from '../enums/division.js';
import { energyDirectionEnum } from '../enums/energy-direction.js';

export const marketLocationSchema = z.object({
  meta: metaSchema,
  /** 11-digit market location id (MaLo-ID). */
  marketLocationId: z.string().optional(),
  division: divisionEnum.schema.optional(),
  energyDirection: energyDirectionEnum.schema.optional(),
  customerType: customerTypeEnum.schema.optional(),
  address: addressSchema.optional(),
  supplyStart: z.date().optional(),
  supplyEnd: z.date().optional(),
  /** Forecast annual consumption in kWh. */
  annualConsumption: z.number().optional(),
  networkOperatorCode: z.string().optional(),
  basicSupplierCode: z.string().optional(),
  meteringOperatorCode: z.string().optional(),
  transmissionOperatorCode: z.string().optional(),
  gridLevel: z.string().optional(),
  networkArea: z.string().optional(),
  balancingArea: z.string().optional(),
  meteringLocationIds: z.array(z.string()).optional(),
  isControllableResource: z.boolean().optional(),
});

export type MarketLocation = z.infer<typeof marketLocationSchema>;

/** Point where energy is supplied or fed in, billed as one unit (Marktlokation). */
export const marketLocationType = defineType({
  name: 'MarketLocation',
  germanName: 'Marktlokation',
  category: 'record',
  schema: marketLocationSchema,
  german: {
    marketLocationId: 'marktlokationsId',
    division: 'sparte',
    energyDirection: 'energierichtung',
    customerType: 'kundentyp',
    address: 'adresse',
    supplyStart: 'lieferbeginn',
    supplyEnd: 'lieferende',
    annualConsumption: 'jahresverbrauchsprognose',
    networkOperatorCode: 'netzbetreiberCodenummer',
    basicSupplierCode: 'grundversorgerCodenummer',
    meteringOperatorCode: 'messstellenbetreiberCodenummer',
    transmissionOperatorCode: 'uebertragungsnetzbetreiberCodenummer',
    gridLevel: 'netzebene',
    networkArea: 'netzgebiet',
    balancingArea: 'bilanzierungsgebiet',
    meteringLocationIds: 'messlokationsIds',
    isControllableResource: 'istSteuerbareRessource',
  },
});
