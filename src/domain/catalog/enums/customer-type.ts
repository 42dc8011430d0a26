import { defineEnum } from '../../schema/enum.js';

export const CustomerType = {
  Commercial: 'GEWERBE',
  Private: 'PRIVAT',
  Farmer: 'LANDWIRT',
  Other: 'SONSTIGE',
  Household: 'HAUSHALT',
  DirectHeating: 'DIREKTHEIZUNG',
  SharedMultiFamilyHouse: 'GEMEINSCHAFT_MFH',
  Church: 'KIRCHE',
  CombinedHeatAndPower: 'KWK',
  ChargingStation: 'LADESAEULE',
  PublicLighting: 'BELEUCHTUNG_OEFFENTLICH',
  StreetLighting: 'BELEUCHTUNG_STRASSE',
  StorageHeating: 'SPEICHERHEIZUNG',
  InterruptibleFacility: 'UNTERBR_EINRICHTUNG',
  HeatPump: 'WAERMEPUMPE',
} as const;

export type CustomerType = (typeof CustomerType)[keyof typeof CustomerType];

export const customerTypeEnum = defineEnum('CustomerType', 'Kundentyp', CustomerType);
