import { describe, it, expect } from 'vitest'
import { ExpressionEvaluator, compareOrdered, looselyEqual } from '../../pipelines/expression-evaluator'

describe('ExpressionEvaluator', () => {
  const context = {
    pipelineName: 'orders',
    errorCount: 2,
    variables: { ready: true, region: 'EU', limit: '10' },
    CustomerType: 'Premium',
    Amount: 150,
  }

  describe('evaluate', () => {
    it('should compare JSONPath values with literals', () => {
      expect(ExpressionEvaluator.evaluate('$.CustomerType == "Premium"', context)).toBe(true)
      expect(ExpressionEvaluator.evaluate("$.CustomerType != 'Basic'", context)).toBe(true)
      expect(ExpressionEvaluator.evaluate('$.Amount > 100', context)).toBe(true)
      expect(ExpressionEvaluator.evaluate('$.Amount <= 100', context)).toBe(false)
    })

    it('should coerce numeric strings in comparisons', () => {
      expect(ExpressionEvaluator.evaluate('$.variables.limit == 10', context)).toBe(true)
      expect(ExpressionEvaluator.evaluate('$.variables.limit >= 9', context)).toBe(true)
    })

    it('should combine clauses left to right', () => {
      expect(ExpressionEvaluator.evaluate('$.Amount > 100 && $.variables.region == "EU"', context)).toBe(true)
      expect(ExpressionEvaluator.evaluate('$.Amount > 500 && $.variables.region == "EU"', context)).toBe(false)
      expect(ExpressionEvaluator.evaluate('$.Amount > 500 || $.errorCount == 2', context)).toBe(true)
    })

    it('should test a lone operand for truthiness', () => {
      expect(ExpressionEvaluator.evaluate('$.variables.ready', context)).toBe(true)
      expect(ExpressionEvaluator.evaluate('$.variables.missing', context)).toBe(false)
      expect(ExpressionEvaluator.evaluate('false', context)).toBe(false)
    })

    it('should treat missing values as null', () => {
      expect(ExpressionEvaluator.evaluate('$.nothing == null', context)).toBe(true)
      expect(ExpressionEvaluator.evaluate('$.nothing > 1', context)).toBe(false)
    })

    it('should keep quoted strings with spaces intact', () => {
      const scope = { status: 'on hold' }
      expect(ExpressionEvaluator.evaluate('$.status == "on hold"', scope)).toBe(true)
    })

    it('should return false when the JSONPath is invalid', () => {
      expect(ExpressionEvaluator.evaluate('$..[ == 1', context)).toBe(false)
    })
  })

  describe('resolve', () => {
    it('should resolve paths and literals', () => {
      expect(ExpressionEvaluator.resolve('$.Amount', context)).toBe(150)
      expect(ExpressionEvaluator.resolve('"text"', context)).toBe('text')
      expect(ExpressionEvaluator.resolve('42', context)).toBe(42)
      expect(ExpressionEvaluator.resolve('null', context)).toBeNull()
    })

    it('should return bare words unchanged', () => {
      expect(ExpressionEvaluator.resolve('Gold', context)).toBe('Gold')
    })
  })

  describe('validate', () => {
    it('should accept well-formed expressions', () => {
      expect(() => ExpressionEvaluator.validate('$.a == 1 && $.b')).not.toThrow()
    })

    it('should reject empty expressions', () => {
      expect(() => ExpressionEvaluator.validate('   ')).toThrow('Expression is empty')
    })

    it('should reject malformed clauses', () => {
      expect(() => ExpressionEvaluator.validate('$.a == ')).toThrow('Malformed clause "$.a =="')
    })

    it('should reject unknown operators between operands', () => {
      expect(() => ExpressionEvaluator.validate('$.a is 1')).toThrow('Unknown operator "is"')
    })
  })

  describe('looselyEqual', () => {
    it('should treat null and undefined as equal', () => {
      expect(looselyEqual(null, undefined)).toBe(true)
      expect(looselyEqual(null, 0)).toBe(false)
    })

    it('should coerce numbers and booleans', () => {
      expect(looselyEqual('5', 5)).toBe(true)
      expect(looselyEqual('true', true)).toBe(true)
      expect(looselyEqual('a', 'b')).toBe(false)
    })

    it('should not treat blank strings or objects as zero', () => {
      expect(looselyEqual('', 0)).toBe(false)
      expect(looselyEqual('   ', 0)).toBe(false)
      expect(looselyEqual([], 0)).toBe(false)
      expect(looselyEqual(0, {})).toBe(false)
      expect(looselyEqual(' 0 ', 0)).toBe(true)
    })

    it('should compare dates by instant', () => {
      expect(looselyEqual(new Date('2024-01-01T00:00:00Z'), new Date('2024-01-01T00:00:00Z'))).toBe(true)
    })
  })

  describe('compareOrdered', () => {
    it('should compare numerically when both sides are numeric', () => {
      expect(compareOrdered('10', '9', (a, b) => a > b)).toBe(true)
    })

    it('should fall back to string comparison', () => {
      expect(compareOrdered('apple', 'banana', (a, b) => a < b)).toBe(true)
    })

    it('should never compare missing values', () => {
      expect(compareOrdered(undefined, 1, (a, b) => a < b)).toBe(false)
      expect(compareOrdered(null, 1, (a, b) => a < b)).toBe(false)
    })
  })
})
