import { z } from 'zod';
import { defineType } from '../../schema/descriptor.js';
import { metaSchema } from '../../schema/envelope.js';
import { energyDirectionEnum } from '../enums/energy-direction.js';
import { registerTypeEnum } from '../enums/register-type.js';
import { unitEnum } from '../enums/unit.js';

export const meterRegisterSchema = z.object({
  meta: metaSchema,
  registerId: z.string().optional(),
  /** OBIS code, e.g. `1-0:1.8.0`. */
  obisCode: z.string().optional(),
  registerType: registerTypeEnum.schema.optional(),
  energyDirection: energyDirectionEnum.schema.optional(),
  unit: unitEnum.schema.optional(),
  decimalPlaces: z.number().int().optional(),
  transformerRatio: z.number().optional(),
  description: z.string().optional(),
});

export type MeterRegister = z.infer<typeof meterRegisterSchema>;

/** One register (Zaehlwerk) of a meter. */
export const meterRegisterType = defineType({
  name: 'MeterRegister',
  germanName: 'Zaehlwerk',
  category: 'component',
  schema: meterRegisterSchema,
  german: {
    registerId: 'zaehlwerkskennung',
    obisCode: 'obisKennzahl',
    registerType: 'registerart',
    energyDirection: 'energierichtung',
    unit: 'einheit',
    decimalPlaces: 'nachkommastellen',
    transformerRatio: 'wandlerfaktor',
    description: 'bezeichnung',
  },
});
