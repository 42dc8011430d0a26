import { defineEnum } from '../../schema/enum.js';

export const BusinessPartnerRole = {
  Supplier: 'LIEFERANT',
  ServiceProvider: 'DIENSTLEISTER',
  Customer: 'KUNDE',
  Prospect: 'INTERESSENT',
  MarketPartner: 'MARKTPARTNER',
  NetworkOperator: 'NETZBETREIBER',
} as const;

export type BusinessPartnerRole = (typeof BusinessPartnerRole)[keyof typeof BusinessPartnerRole];

export const businessPartnerRoleEnum = defineEnum(
  'BusinessPartnerRole',
  'Geschaeftspartnerrolle',
  BusinessPartnerRole,
);
