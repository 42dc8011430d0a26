import { describe, it, expect } from 'vitest';
import '../../src/domain/catalog/index.js';
import { JSON_SCHEMA_DIALECT, describeCatalog, describeType } from '../../src/application/schema-dump.js';
import { additionalAttributeType } from '../../src/domain/schema/envelope.js';
import { addressType } from '../../src/domain/catalog/components/address.js';
import { divisionEnum } from '../../src/domain/catalog/enums/division.js';
import { meterType } from '../../src/domain/catalog/records/meter.js';

describe('describeType', () => {
  it('keys properties by German wire names', () => {
    const schema = describeType(meterType, 'german');
    expect(schema).toMatchObject({
      $schema: JSON_SCHEMA_DIALECT,
      type: 'object',
      title: 'Zaehler',
      additionalProperties: true,
      properties: {
        _typ: { type: 'string' },
        zusatzAttribute: { type: 'array', items: { $ref: '#/$defs/ZusatzAttribut' } },
        zaehlernummer: { type: 'string' },
        sparte: { type: 'string', title: 'Sparte', enum: [...divisionEnum.tokens] },
        standort: { $ref: '#/$defs/Adresse' },
        zaehlwerke: { type: 'array', items: { $ref: '#/$defs/Zaehlwerk' } },
        herstellungsjahr: { type: 'integer' },
        einbaudatum: { type: 'string', format: 'date-time' },
      },
    });
    expect(schema).not.toHaveProperty('required');
  });

  it('keys properties by English wire names', () => {
    const schema = describeType(meterType, 'english');
    expect(schema).toMatchObject({
      title: 'Meter',
      properties: {
        meterNumber: { type: 'string' },
        division: { title: 'Division' },
        location: { $ref: '#/$defs/Address' },
        additionalAttributes: { type: 'array', items: { $ref: '#/$defs/AdditionalAttribute' } },
      },
    });
    expect(schema).toHaveProperty(['$defs', 'MeterRegister', 'properties', 'obisCode'], { type: 'string' });
    expect(schema).toHaveProperty(['$defs', 'Address', 'properties', 'coErgaenzung'], { type: 'string' });
  });

  it('lists required fields', () => {
    expect(describeType(additionalAttributeType, 'german')).toMatchObject({
      title: 'ZusatzAttribut',
      properties: { name: { type: 'string' }, value: {} },
      required: ['name'],
    });
  });

  it('omits $defs for types without nested types', () => {
    expect(describeType(additionalAttributeType)).not.toHaveProperty('$defs');
    expect(describeType(addressType)).toHaveProperty(['$defs', 'ZusatzAttribut']);
  });
});

describe('describeCatalog', () => {
  it('defines every record and component but not the envelope', () => {
    const schema = describeCatalog('english');
    const defs = schema['$defs'];
    expect(Object.keys(typeof defs === 'object' && defs !== null ? defs : {}).sort()).toEqual([
      'AdditionalAttribute',
      'Address',
      'BusinessPartner',
      'GeoCoordinates',
      'Hardware',
      'MarketLocation',
      'Meter',
      'MeterRegister',
      'MeteringLocation',
    ]);
  });

  it('uses German type names under the German convention', () => {
    expect(describeCatalog('german')).toHaveProperty(['$defs', 'Marktlokation', 'title'], 'Marktlokation');
  });
});
