import { z } from 'zod';
import { defineType } from '../../schema/descriptor.js';
import { metaSchema } from '../../schema/envelope.js';
import { addressSchema } from '../components/address.js';
import { geoCoordinatesSchema } from '../components/geo-coordinates.js';
import { hardwareSchema } from '../components/hardware.js';
import { divisionEnum } from '../enums/division.js';

export const meteringLocationSchema = z.object({
  meta: metaSchema,
  /** 33-character metering location id (MeLo-ID). */
  meteringLocationId: z.string().optional(),
  division: divisionEnum.schema.optional(),
  address: addressSchema.optional(),
  coordinates: geoCoordinatesSchema.optional(),
  meteringOperatorCode: z.string().optional(),
  networkOperatorCode: z.string().optional(),
  gridArea: z.string().optional(),
  description: z.string().optional(),
  hardware: z.array(hardwareSchema).optional(),
  meterIds: z.array(z.string()).optional(),
  marketLocationIds: z.array(z.string()).optional(),
});

export type MeteringLocation = z.infer<typeof meteringLocationSchema>;

export const meteringLocationType = defineType({
  name: 'MeteringLocation',
  germanName: 'Messlokation',
  category: 'record',
  schema: meteringLocationSchema,
  german: {
    meteringLocationId: 'messlokationsId',
    division: 'sparte',
    address: 'adresse',
    coordinates: 'geokoordinaten',
    meteringOperatorCode: 'messstellenbetreiberCodenummer',
    networkOperatorCode: 'netzbetreiberCodenummer',
    gridArea: 'regelzone',
    description: 'beschreibung',
    hardware: 'geraete',
    meterIds: 'zaehler',
    marketLocationIds: 'marktlokationen',
  },
});
