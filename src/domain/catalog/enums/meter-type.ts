import { defineEnum } from '../../schema/enum.js';

export const MeterType = {
  ThreePhaseMeter: 'DREHSTROMZAEHLER',
  BellowsGasMeter: 'BALGENGASZAEHLER',
  RotaryPistonMeter: 'DREHKOLBENZAEHLER',
  PowerMeter: 'LEISTUNGSZAEHLER',
  MaximumDemandMeter: 'MAXIMUMZAEHLER',
  TurbineGasMeter: 'TURBINENRADGASZAEHLER',
  UltrasonicGasMeter: 'ULTRASCHALLGASZAEHLER',
  AlternatingCurrentMeter: 'WECHSELSTROMZAEHLER',
  ModernMeteringDevice: 'MODERNE_MESSEINRICHTUNG',
  SmartMeteringSystem: 'INTELLIGENTES_MESSSYSTEM',
  ElectronicMeter: 'ELEKTRONISCHER_ZAEHLER',
  VortexGasMeter: 'WIRBELGASZAEHLER',
  WaterMeter: 'WASSERZAEHLER',
} as const;

export type MeterType = (typeof MeterType)[keyof typeof MeterType];

export const meterTypeEnum = defineEnum('MeterType', 'Zaehlertyp', MeterType);
