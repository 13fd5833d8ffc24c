import { describe, it, expect } from 'vitest'
import { createValidator, customValidator } from '../../transformation/validation/field-validators'
import { DataRecord } from '../../records'
import { ConfigurationError } from '../../pipelines/errors'

const record = DataRecord.from({})

describe('field validators', () => {
  describe('required', () => {
    const required = createValidator({ type: 'required', field: 'Email' })

    it('should fail on null, undefined and blank values', () => {
      for (const value of [null, undefined, '', '   ']) {
        expect(required.check(value, record)).toBe('Field is required but is null or empty')
      }
    })

    it('should pass on present values', () => {
      expect(required.check('a@b.test', record)).toBeUndefined()
      expect(required.check(0, record)).toBeUndefined()
      expect(required.name).toBe('required_Email')
    })
  })

  describe('type', () => {
    it('should accept numeric strings as numbers', () => {
      const number = createValidator({ type: 'type', field: 'Amount', expected: 'number' })
      expect(number.check(12.5, record)).toBeUndefined()
      expect(number.check('12.5', record)).toBeUndefined()
      expect(number.check('twelve', record)).toBe("Value 'twelve' is not a valid number")
      expect(number.check(Number.NaN, record)).toBe('Value NaN is not a valid number')
    })

    it('should skip null values', () => {
      const date = createValidator({ type: 'type', field: 'Due', expected: 'date' })
      expect(date.check(null, record)).toBeUndefined()
    })

    it('should check dates and booleans', () => {
      const date = createValidator({ type: 'type', field: 'Due', expected: 'date' })
      const flag = createValidator({ type: 'type', field: 'Active', expected: 'boolean' })

      expect(date.check('2024-05-01', record)).toBeUndefined()
      expect(date.check('someday', record)).toBe("Value 'someday' is not a valid date")
      expect(flag.check('true', record)).toBeUndefined()
      expect(flag.check(1, record)).toBe('Value 1 is not a valid boolean')
    })
  })

  describe('pattern', () => {
    it('should describe mismatches', () => {
      const zip = createValidator({ type: 'pattern', field: 'Zip', pattern: '^[0-9]{5}$' })

      expect(zip.check('12345', record)).toBeUndefined()
      expect(zip.check('1234', record)).toBe("Value '1234' does not match pattern '^[0-9]{5}$'")
      expect(zip.check(null, record)).toBe("Value '' does not match pattern '^[0-9]{5}$'")
    })

    it('should use a custom message', () => {
      const zip = createValidator({ type: 'pattern', field: 'Zip', pattern: '^\\d+$', message: 'Zip must be digits' })
      expect(zip.check('abc', record)).toBe('Zip must be digits')
    })

    it('should reject an invalid pattern up front', () => {
      expect(() => createValidator({ type: 'pattern', field: 'Zip', pattern: '[' })).toThrow(ConfigurationError)
    })
  })

  describe('range', () => {
    const range = createValidator({ type: 'range', field: 'Age', min: 18, max: 65 })

    it('should pass values within bounds', () => {
      expect(range.check(18, record)).toBeUndefined()
      expect(range.check('65', record)).toBeUndefined()
    })

    it('should describe out-of-range values', () => {
      expect(range.check(70, record)).toBe('Value 70 is not between 18 and 65')
      expect(range.check(null, record)).toBe('Value is null')
      expect(range.check('old', record)).toBe("Value 'old' is not a valid number")
    })

    it('should allow open-ended bounds', () => {
      const atLeast = createValidator({ type: 'range', field: 'Qty', min: 1 })
      expect(atLeast.check(0, record)).toBe('Value 0 is not between 1 and Infinity')
      expect(atLeast.check(1_000_000, record)).toBeUndefined()
    })
  })

  describe('length', () => {
    it('should check string length', () => {
      const code = createValidator({ type: 'length', field: 'Code', min: 2, max: 4 })

      expect(code.check('abc', record)).toBeUndefined()
      expect(code.check('a', record)).toBe('Length 1 is not between 2 and 4')
      expect(code.check('abcde', record)).toBe('Length 5 is not between 2 and 4')
      expect(code.check(null, record)).toBe('Length 0 is not between 2 and 4')
    })
  })

  describe('customValidator', () => {
    it('should map boolean and string outcomes', () => {
      const even = customValidator('even', 'Qty', value => Number(value) % 2 === 0)
      const named = customValidator('named', 'Qty', value => (value === 'x' ? true : 'Qty must be x'))

      expect(even.check(2, record)).toBeUndefined()
      expect(even.check(3, record)).toBe('Validation "even" failed')
      expect(named.check('y', record)).toBe('Qty must be x')
    })

    it('should see the whole record', () => {
      const matches = customValidator('confirm', 'Confirm', (value, r) => value === r.get('Password'))
      expect(matches.check('test-secret', DataRecord.from({ Password: 'test-secret' }))).toBeUndefined()
    })
  })
})
