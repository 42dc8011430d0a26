import { z } from 'zod';
import { defineType } from '../../schema/descriptor.js';
import { metaSchema } from '../../schema/envelope.js';
import { addressSchema } from '../components/address.js';
import { hardwareSchema } from '../components/hardware.js';
import { meterRegisterSchema } from '../components/meter-register.js';
import { divisionEnum } from '../enums/division.js';
import { meterSizeEnum } from '../enums/meter-size.js';
import { meterTypeEnum } from '../enums/meter-type.js';

export const meterSchema = z.object({
  meta: metaSchema,
  meterNumber: z.string().optional(),
  division: divisionEnum.schema.optional(),
  meterType: meterTypeEnum.schema.optional(),
  meterSize: meterSizeEnum.schema.optional(),
  location: addressSchema.optional(),
  registers: z.array(meterRegisterSchema).optional(),
  hardware: z.array(hardwareSchema).optional(),
  marketLocationId: z.string().optional(),
  meteringLocationId: z.string().optional(),
  ownership: z.string().optional(),
  manufacturer: z.string().optional(),
  manufacturingYear: z.number().int().optional(),
  installationDate: z.date().optional(),
  removalDate: z.date().optional(),
  calibrationDate: z.date().optional(),
  calibrationExpiryDate: z.date().optional(),
});

export type Meter = z.infer<typeof meterSchema>;

/**
 * A physical meter (Zaehler) with its registers and attached hardware.
 */
export const meterType = defineType({
  name: 'Meter',
  germanName: 'Zaehler',
  category: 'record',
  schema: meterSchema,
  german: {
    meterNumber: 'zaehlernummer',
    division: 'sparte',
    meterType: 'zaehlertyp',
    meterSize: 'zaehlergroesse',
    location: 'standort',
    registers: 'zaehlwerke',
    hardware: 'geraeteeigenschaften',
    marketLocationId: 'marktlokationsId',
    meteringLocationId: 'messlokationsId',
    ownership: 'eigentumsverhaeltnis',
    manufacturer: 'hersteller',
    manufacturingYear: 'herstellungsjahr',
    installationDate: 'einbaudatum',
    removalDate: 'ausbaudatum',
    calibrationDate: 'eichdatum',
    calibrationExpiryDate: 'eichablaufdatum',
  },
});
