import { vi } from 'vitest';
import type { DecodeError, DecodeResult } from '../src/application/errors.js';
import {
  BusinessPartnerRole,
  Country,
  CustomerType,
  DeviceCategory,
  DeviceType,
  Division,
  EnergyDirection,
  MeterSize,
  MeterType,
  RegisterType,
  Unit,
} from '../src/domain/catalog/enums/index.js';
import { businessPartnerType } from '../src/domain/catalog/records/business-partner.js';
import type { BusinessPartner } from '../src/domain/catalog/records/business-partner.js';
import { marketLocationType } from '../src/domain/catalog/records/market-location.js';
import type { MarketLocation } from '../src/domain/catalog/records/market-location.js';
import { meterType } from '../src/domain/catalog/records/meter.js';
import type { Meter } from '../src/domain/catalog/records/meter.js';
import { meteringLocationType } from '../src/domain/catalog/records/metering-location.js';
import type { MeteringLocation } from '../src/domain/catalog/records/metering-location.js';
import type { TypeDescriptor } from '../src/domain/schema/descriptor.js';

export function fakeLogger() {
  return {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  } as unknown as import('pino').Logger;
}

/** Meter with every field and every envelope attribute present. */
export function makeFullMeter(): Meter {
  return {
    meta: {
      typ: 'Zaehler',
      version: '202401.0.1',
      id: 'meter-1',
      additionalAttributes: [
        { name: 'source', value: 'test-system' },
        { name: 'flags', value: { nested: [1, true, null, 'x'] } },
        { name: 'empty' },
      ],
    },
    meterNumber: '1EMH0012345678',
    division: Division.Electricity,
    meterType: MeterType.ThreePhaseMeter,
    meterSize: MeterSize.G2_5,
    location: {
      meta: {},
      street: 'Teststrasse',
      houseNumber: '1a',
      postalCode: '12345',
      city: 'Musterstadt',
      district: 'Mitte',
      poBox: '',
      addressAddition: 'Hinterhaus',
      careOf: 'Test GmbH',
      countryCode: Country.DE,
    },
    registers: [
      {
        meta: { id: 'register-1' },
        registerId: '1',
        obisCode: '1-0:1.8.0',
        registerType: RegisterType.SingleRate,
        energyDirection: EnergyDirection.FeedOut,
        unit: Unit.KilowattHour,
        decimalPlaces: 2,
        transformerRatio: 1.5,
        description: 'Bezug',
      },
      {
        meta: {},
        registerId: '2',
        energyDirection: EnergyDirection.FeedIn,
        unit: Unit.KilowattHour,
        decimalPlaces: 0,
      },
    ],
    hardware: [
      {
        meta: {},
        deviceNumber: 'HW-1',
        description: 'Gateway',
        deviceCategory: DeviceCategory.SmartMeterGateway,
        deviceType: DeviceType.Modem,
      },
    ],
    marketLocationId: '51238696781',
    meteringLocationId: 'DE0001234567890123456789012345678',
    ownership: 'MSB',
    manufacturer: 'Test Manufacturer',
    manufacturingYear: 2021,
    installationDate: new Date('2022-03-01T00:00:00.000Z'),
    removalDate: new Date('2031-12-31T23:00:00.000Z'),
    calibrationDate: new Date('2022-01-15T10:30:00.000Z'),
    calibrationExpiryDate: new Date('2030-01-15T10:30:00.000Z'),
  };
}

/** Meter with some fields present, including present-with-default values. */
export function makeMixedMeter(): Meter {
  return {
    meta: { typ: 'Zaehler' },
    meterNumber: '',
    division: Division.Gas,
    meterSize: MeterSize.G4,
    registers: [],
    manufacturingYear: 0,
  };
}

export function makeFullMarketLocation(): MarketLocation {
  return {
    meta: {
      typ: 'Marktlokation',
      version: '202401.0.1',
      id: 'malo-1',
      additionalAttributes: [{ name: 'cleared', value: null }],
    },
    marketLocationId: '51238696781',
    division: Division.Electricity,
    energyDirection: EnergyDirection.FeedOut,
    customerType: CustomerType.Household,
    address: { meta: {}, street: 'Teststrasse', houseNumber: '2', postalCode: '12345', city: 'Musterstadt', countryCode: Country.DE },
    supplyStart: new Date('2024-01-01T00:00:00.000Z'),
    supplyEnd: new Date('2024-12-31T23:00:00.000Z'),
    annualConsumption: 3500.5,
    networkOperatorCode: '9900000000001',
    basicSupplierCode: '9900000000002',
    meteringOperatorCode: '9900000000003',
    transmissionOperatorCode: '9900000000004',
    gridLevel: 'NSP',
    networkArea: 'Netzgebiet Test',
    balancingArea: '11YTEST',
    meteringLocationIds: ['DE0001234567890123456789012345678', 'DE0001234567890123456789012345679'],
    isControllableResource: true,
  };
}

export function makeMixedMarketLocation(): MarketLocation {
  return {
    meta: {},
    division: Division.Gas,
    annualConsumption: 0,
    meteringLocationIds: [],
    isControllableResource: false,
  };
}

export function makeFullMeteringLocation(): MeteringLocation {
  return {
    meta: { id: 'melo-1', additionalAttributes: [{ name: 'tags', value: ['a', 2, false] }] },
    meteringLocationId: 'DE0001234567890123456789012345678',
    division: Division.Electricity,
    address: { meta: {}, street: 'Teststrasse', city: 'Musterstadt', careOf: 'Test GmbH' },
    coordinates: { meta: {}, latitude: 52.52, longitude: 13.405 },
    meteringOperatorCode: '9900000000003',
    networkOperatorCode: '9900000000001',
    gridArea: 'Regelzone Test',
    description: 'Hausanschluss',
    hardware: [{ meta: {}, deviceNumber: 'HW-2', deviceCategory: DeviceCategory.SmartMeterGateway }],
    meterIds: ['1EMH0012345678'],
    marketLocationIds: ['51238696781'],
  };
}

export function makeMixedMeteringLocation(): MeteringLocation {
  return {
    meta: {},
    coordinates: { meta: {}, latitude: 0 },
    description: '',
    hardware: [],
  };
}

export function makeFullBusinessPartner(): BusinessPartner {
  return {
    meta: { typ: 'Geschaeftspartner', id: 'gp-1' },
    partnerId: 'GP-0001',
    name1: 'Test',
    name2: 'Energie',
    name3: 'GmbH',
    roles: [BusinessPartnerRole.Customer, BusinessPartnerRole.Supplier],
    address: { meta: {}, street: 'Teststrasse', postalCode: '12345', countryCode: Country.AT },
    commercialRegisterNumber: 'HRB 12345',
    taxId: '123/456/78901',
    vatId: 'DE123456789',
  };
}

export function makeMixedBusinessPartner(): BusinessPartner {
  return { meta: {}, name1: 'Test', roles: [] };
}

/** A record type with sample values covering full, empty and mixed records. */
export interface RecordCase {
  readonly type: TypeDescriptor;
  readonly samples: readonly (readonly [label: string, make: () => unknown])[];
}

function recordCase<T>(
  type: TypeDescriptor<T>,
  full: () => T,
  mixed: () => T,
  empty: () => T,
): RecordCase {
  return {
    type,
    samples: [
      ['all fields present', full],
      ['all fields absent', empty],
      ['some fields present', mixed],
    ],
  };
}

/** Every record type of the catalog. */
export function recordCases(): RecordCase[] {
  return [
    recordCase(meterType, makeFullMeter, makeMixedMeter, () => ({ meta: {} })),
    recordCase(marketLocationType, makeFullMarketLocation, makeMixedMarketLocation, () => ({ meta: {} })),
    recordCase(meteringLocationType, makeFullMeteringLocation, makeMixedMeteringLocation, () => ({ meta: {} })),
    recordCase(businessPartnerType, makeFullBusinessPartner, makeMixedBusinessPartner, () => ({ meta: {} })),
  ];
}

/** Returns the error of a failed decode; fails the test when decoding succeeded. */
export function expectFailure<T>(result: DecodeResult<T>): DecodeError {
  if (result.ok) {
    throw new Error(`Expected decoding to fail, got ${JSON.stringify(result.value)}`);
  }
  return result.error;
}

/** Returns the value of a successful decode; fails the test with the error otherwise. */
export function expectSuccess<T>(result: DecodeResult<T>): T {
  if (!result.ok) {
    throw new Error(`Expected decoding to succeed, got ${result.error.kind}: ${result.error.message}`);
  }
  return result.value;
}
