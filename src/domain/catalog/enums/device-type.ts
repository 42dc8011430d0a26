import { defineEnum } from '../../schema/enum.js';

export const DeviceType = {
  MultiplexUnit: 'MULTIPLEXANLAGE',
  FlatRateUnit: 'PAUSCHALANLAGE',
  AmplifierUnit: 'VERSTAERKERANLAGE',
  SummationDevice: 'SUMMATIONSGERAET',
  PulseGenerator: 'IMPULSGEBER',
  VolumeConverter: 'MENGENUMWERTER',
  CurrentTransformer: 'STROMWANDLER',
  VoltageTransformer: 'SPANNUNGSWANDLER',
  CombinedTransformer: 'KOMBIMESSWANDLER',
  BlockCurrentTransformer: 'BLOCKSTROMWANDLER',
  DataLogger: 'DATENLOGGER',
  CommunicationPort: 'KOMMUNIKATIONSANSCHLUSS',
  Modem: 'MODEM',
  TelecommunicationDevice: 'TELEKOMMUNIKATIONSEINRICHTUNG',
  ModernMeteringDevice: 'MODERNE_MESSEINRICHTUNG',
  SmartMeteringSystem: 'INTELLIGENTES_MESSYSTEM',
  ControlDevice: 'STEUEREINRICHTUNG',
  TariffSwitch: 'TARIFSCHALTGERAET',
  RippleControlReceiver: 'RUNDSTEUEREMPFAENGER',
} as const;

export type DeviceType = (typeof DeviceType)[keyof typeof DeviceType];

export const deviceTypeEnum = defineEnum('DeviceType', 'Geraetetyp', DeviceType);
