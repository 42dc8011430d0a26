import { defineEnum } from '../../schema/enum.js';

/** Energy sector a record belongs to. */
export const Division = {
  Electricity: 'STROM',
  Gas: 'GAS',
  DistrictHeating: 'FERNWAERME',
  LocalHeating: 'NAHWAERME',
  Water: 'WASSER',
  Wastewater: 'ABWASSER',
  ElectricityAndGas: 'STROM_UND_GAS',
} as const;

export type Division = (typeof Division)[keyof typeof Division];

export const divisionEnum = defineEnum('Division', 'Sparte', Division);
