import { defineEnum } from '../../schema/enum.js';

export const RegisterType = {
  SingleRate: 'EINTARIF',
  DualRate: 'ZWEITARIF',
  MultiRate: 'MEHRTARIF',
} as const;

export type RegisterType = (typeof RegisterType)[keyof typeof RegisterType];

export const registerTypeEnum = defineEnum('RegisterType', 'Registerart', RegisterType);
