import { defineEnum } from '../../schema/enum.js';

/** ISO 3166-1 alpha-2 codes of the countries BO4E addresses commonly use. */
export const Country = {
  DE: 'DE', AT: 'AT', CH: 'CH', NL: 'NL', BE: 'BE', FR: 'FR', LU: 'LU', PL: 'PL',
  CZ: 'CZ', DK: 'DK', IT: 'IT', ES: 'ES', GB: 'GB', SE: 'SE', NO: 'NO', FI: 'FI',
  PT: 'PT', GR: 'GR', IE: 'IE', HU: 'HU', SK: 'SK', SI: 'SI', HR: 'HR', RO: 'RO',
  BG: 'BG', EE: 'EE', LV: 'LV', LT: 'LT', CY: 'CY', MT: 'MT', LI: 'LI', IS: 'IS',
} as const;

export type Country = (typeof Country)[keyof typeof Country];

export const countryEnum = defineEnum('Country', 'Landescode', Country);
