import { defineEnum } from '../../schema/enum.js';

export const DeviceCategory = {
  Transformer: 'WANDLER',
  CommunicationDevice: 'KOMMUNIKATIONSEINRICHTUNG',
  TechnicalControlDevice: 'TECHNISCHE_STEUEREINRICHTUNG',
  VolumeConverter: 'MENGENUMWERTER',
  SmartMeterGateway: 'SMARTMETER_GATEWAY',
  ControlBox: 'STEUERBOX',
  MeteringDevice: 'ZAEHLEINRICHTUNG',
} as const;

export type DeviceCategory = (typeof DeviceCategory)[keyof typeof DeviceCategory];

export const deviceCategoryEnum = defineEnum('DeviceCategory', 'Geraeteklasse', DeviceCategory);
