import { z } from 'zod';
import { defineType } from '../../schema/descriptor.js';
import { metaSchema } from '../../schema/envelope.js';

export const geoCoordinatesSchema = z.object({
  meta: metaSchema,
  latitude: z.number().optional(),
  longitude: z.number().optional(),
});

export type GeoCoordinates = z.infer<typeof geoCoordinatesSchema>;

export const geoCoordinatesType = defineType({
  name: 'GeoCoordinates',
  germanName: 'Geokoordinaten',
  category: 'component',
  schema: geoCoordinatesSchema,
  german: { latitude: 'breitengrad', longitude: 'laengengrad' },
});
