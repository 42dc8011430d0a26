import { defineEnum } from '../../schema/enum.js';

export const EnergyDirection = {
  FeedOut: 'AUSSP',
  FeedIn: 'EINSP',
} as const;

export type EnergyDirection = (typeof EnergyDirection)[keyof typeof EnergyDirection];

export const energyDirectionEnum = defineEnum('EnergyDirection', 'Energierichtung', EnergyDirection);
