import { defineEnum } from '../../schema/enum.js';

/** Units of measure for registers and quantities. */
export const Unit = {
  Watt: 'W',
  Kilowatt: 'KW',
  Megawatt: 'MW',
  WattHour: 'WH',
  KilowattHour: 'KWH',
  MegawattHour: 'MWH',
  Var: 'VAR',
  Kilovar: 'KVAR',
  VarHour: 'VARH',
  KilovarHour: 'KVARH',
  CubicMetre: 'KUBIKMETER',
  Piece: 'STUECK',
  Second: 'SEKUNDE',
  Minute: 'MINUTE',
  Hour: 'STUNDE',
  QuarterHour: 'VIERTEL_STUNDE',
  Day: 'TAG',
  Week: 'WOCHE',
  Month: 'MONAT',
  Quarter: 'QUARTAL',
  HalfYear: 'HALBJAHR',
  Year: 'JAHR',
  Percent: 'PROZENT',
  KilowattHourPerKelvin: 'KWHK',
} as const;

export type Unit = (typeof Unit)[keyof typeof Unit];

export const unitEnum = defineEnum('Unit', 'Mengeneinheit', Unit);
