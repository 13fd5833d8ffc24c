import { describe, it, expect, beforeEach } from 'vitest'
import pino from 'pino'
import { DataMapper } from '../../transformation/mapping/data-mapper'
import { fieldTransforms } from '../../transformation/mapping/field-transformations'
import { DataRecord } from '../../records'
import { ConfigurationError } from '../../pipelines/errors'

describe('DataMapper', () => {
  let mapper: DataMapper

  beforeEach(() => {
    mapper = new DataMapper('customers', pino({ level: 'silent' }))
  })

  describe('field mappings', () => {
    it('should project only mapped fields', async () => {
      mapper.addMapping('first_name', 'FirstName').addMapping('email', 'Email', fieldTransforms.create('toLower'))

      const [record] = await mapper.map([DataRecord.from({ first_name: 'Ada', email: 'ADA@EXAMPLE.TEST', internal: 1 })])

      expect(record.toObject()).toEqual({ FirstName: 'Ada', Email: 'ada@example.test' })
    })

    it('should reject a source field mapped twice', () => {
      mapper.addMapping('id', 'Id')

      expect(() => mapper.addMapping('id', 'OtherId')).toThrow(ConfigurationError)
      expect(() => mapper.addMapping('id', 'OtherId')).toThrow('Source field "id" is already mapped in mapper "customers"')
    })

    it('should use the default value or null for missing source fields', async () => {
      mapper.addMapping('country', 'Country', undefined, { defaultValue: 'US' }).addMapping('phone', 'Phone')

      const [record] = await mapper.map([DataRecord.from({})])

      expect(record.get('Country')).toBe('US')
      expect(record.get('Phone')).toBeNull()
      expect(record.errors).toEqual([])
    })

    it('should record an error for a missing required field', async () => {
      mapper.addMapping('id', 'CustomerId', undefined, { required: true })

      const [record] = await mapper.map([DataRecord.from({ name: 'x' })])

      expect(record.get('CustomerId')).toBeNull()
      expect(record.errors).toHaveLength(1)
      expect(record.errors[0]).toMatchObject({
        code: 'MAPPING_ERROR',
        message: 'Required source field "id" is missing',
        source: 'Mapping: CustomerId',
        field: 'CustomerId',
      })
    })

    it('should keep the record and flag a failing transform', async () => {
      mapper.addMapping('amount', 'Amount', fieldTransforms.create('toNumber')).addMapping('name', 'Name')

      const output = await mapper.map([DataRecord.from({ amount: 'lots', name: 'Ada' })])

      expect(output).toHaveLength(1)
      expect(output[0].get('Amount')).toBeNull()
      expect(output[0].get('Name')).toBe('Ada')
      expect(output[0].errors[0].message).toBe('Transform of "amount" failed: Cannot convert "lots" to a number')
      expect(mapper.getStatistics().lastRun?.mappingErrors).toBe(1)
    })
  })

  describe('constant and conditional mappings', () => {
    it('should apply constants after field mappings', async () => {
      mapper.addMapping('status', 'Status').addConstantMapping('Status', 'imported')

      const [record] = await mapper.map([DataRecord.from({ status: 'raw' })])

      expect(record.get('Status')).toBe('imported')
    })

    it('should give conditionals the mapped and source records', async () => {
      mapper
        .addMapping('total', 'Total')
        .addConstantMapping('Currency', 'EUR')
        .addConditionalMapping('Label', (mapped, source) => `${String(mapped.get('Total'))} ${String(mapped.get('Currency'))} for ${String(source.get('name'))}`)

      const [record] = await mapper.map([DataRecord.from({ total: 20, name: 'Ada' })])

      expect(record.get('Label')).toBe('20 EUR for Ada')
    })

    it('should flag a throwing conditional', async () => {
      mapper.addConditionalMapping('Broken', () => {
        throw new Error('no rate')
      })

      const [record] = await mapper.map([DataRecord.from({})])

      expect(record.get('Broken')).toBeNull()
      expect(record.errors[0].message).toBe('Conditional mapping failed: no rate')
    })
  })

  it('should carry identity, origin, metadata and earlier errors over', async () => {
    mapper.addMapping('a', 'A')
    const source = DataRecord.from({ a: 1 }, { id: 'r-1', source: 'orders.csv', rowNumber: 4 })
    source.metadata.set('batch', 9)
    source.addError({ code: 'VALIDATION_ERROR', message: 'earlier', source: 'Validator: a', severity: 'medium' })

    const mapped = mapper.mapRecord(source)

    expect(mapped.id).toBe('r-1')
    expect(mapped.source).toBe('orders.csv')
    expect(mapped.rowNumber).toBe(4)
    expect(mapped.metadata.get('batch')).toBe(9)
    expect(mapped.errors.map(e => e.message)).toEqual(['earlier'])
  })

  describe('fromDefinition', () => {
    it('should build field, constant and conditional mappings', async () => {
      const built = DataMapper.fromDefinition(
        [
          { type: 'field', source: 'email', target: 'Email', transforms: ['trim', 'toLower'] },
          { type: 'field', source: 'total', target: 'Total', transforms: [{ name: 'toNumber' }] },
          { type: 'constant', target: 'Source', value: 'crm' },
          { type: 'conditional', target: 'Tier', condition: '$.Total >= 100', whenTrue: 'Gold', whenFalse: 'Standard' },
          { type: 'conditional', target: 'Origin', condition: '$._source.region == "EU"', whenTrue: '$._source.region' },
        ],
        { logger: pino({ level: 'silent' }) }
      )

      const [gold, standard] = await built.map([
        DataRecord.from({ email: ' A@X.TEST ', total: '150', region: 'EU' }),
        DataRecord.from({ email: 'b@x.test', total: '20', region: 'US' }),
      ])

      expect(gold.toObject()).toEqual({ Email: 'a@x.test', Total: 150, Source: 'crm', Tier: 'Gold', Origin: 'EU' })
      expect(standard.toObject()).toEqual({ Email: 'b@x.test', Total: 20, Source: 'crm', Tier: 'Standard', Origin: null })
    })

    it('should reject a malformed condition', () => {
      expect(() =>
        DataMapper.fromDefinition([{ type: 'conditional', target: 'X', condition: '$.a ==' }])
      ).toThrow('Malformed clause')
    })

    it('should reject unknown transforms', () => {
      expect(() =>
        DataMapper.fromDefinition([{ type: 'field', source: 'a', target: 'A', transforms: ['shout'] }])
      ).toThrow('Unknown field transform "shout"')
    })
  })

  describe('validate', () => {
    it('should warn about destinations written twice', () => {
      mapper.addMapping('a', 'Out').addConstantMapping('Out', 1)

      const result = mapper.validate()

      expect(result.isValid).toBe(true)
      expect(result.warnings.map(w => w.message)).toEqual(['Destination field "Out" is written by more than one mapping'])
    })

    it('should reject empty destinations', () => {
      mapper.addMapping('a', ' ')

      expect(mapper.validate().errors.map(e => e.message)).toEqual(['Mapping destination field is required'])
    })

    it('should warn when there are no mappings', () => {
      expect(mapper.validate().warnings.map(w => w.message)).toEqual([
        'Mapper "customers" has no mappings; output records will be empty',
      ])
    })
  })

  it('should remove mappings by destination and report statistics', () => {
    mapper
      .addMapping('a', 'A', fieldTransforms.create('trim'), { required: true })
      .addMapping('b', 'B')
      .addConstantMapping('C', 1)
      .addConditionalMapping('D', () => 1)

    expect(mapper.removeMapping('B')).toBe(true)
    expect(mapper.removeMapping('Z')).toBe(false)
    expect(mapper.getStatistics()).toEqual({
      totalMappings: 3,
      fieldMappings: 1,
      constantMappings: 1,
      conditionalMappings: 1,
      requiredMappings: 1,
      transformMappings: 1,
      lastRun: undefined,
    })

    mapper.clearMappings()
    expect(mapper.mappings).toHaveLength(0)
  })
})
