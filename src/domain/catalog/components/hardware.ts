import { z } from 'zod';
import { defineType } from '../../schema/descriptor.js';
import { metaSchema } from '../../schema/envelope.js';
import { deviceCategoryEnum } from '../enums/device-category.js';
import { deviceTypeEnum } from '../enums/device-type.js';

export const hardwareSchema = z.object({
  meta: metaSchema,
  deviceNumber: z.string().optional(),
  description: z.string().optional(),
  deviceCategory: deviceCategoryEnum.schema.optional(),
  deviceType: deviceTypeEnum.schema.optional(),
});

export type Hardware = z.infer<typeof hardwareSchema>;

export const hardwareType = defineType({
  name: 'Hardware',
  germanName: 'Hardware',
  category: 'component',
  schema: hardwareSchema,
  german: {
    deviceNumber: 'geraetenummer',
    description: 'bezeichnung',
    deviceCategory: 'geraeteklasse',
    deviceType: 'geraetetyp',
  },
});
