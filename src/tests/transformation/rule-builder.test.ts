import { describe, it, expect } from 'vitest'
import { DataRecord } from '../../records'
import { RuleBuilder, compileCondition } from '../../transformation/rules/rule-builder'
import { RuleEngine } from '../../transformation/rules/rule-engine'
import { ConfigurationError } from '../../pipelines/errors'
import pino from 'pino'

describe('compileCondition', () => {
  it('should not match numeric equality on blank fields', () => {
    const isZero = compileCondition({ field: 'Balance', operator: 'equals', value: 0 })

    expect(isZero(new DataRecord({ Balance: '' }))).toBe(false)
    expect(isZero(new DataRecord({ Balance: '0' }))).toBe(true)
    expect(isZero(new DataRecord({ Balance: 0 }))).toBe(true)
  })

  it('should match membership lists loosely', () => {
    const inList = compileCondition({ field: 'Code', operator: 'in', value: [1, 2] })

    expect(inList(new DataRecord({ Code: '2' }))).toBe(true)
    expect(inList(new DataRecord({ Code: '' }))).toBe(false)
  })

  it('should reject list operators without a list', () => {
    expect(() => compileCondition({ field: 'Code', operator: 'notIn', value: 3 })).toThrow(ConfigurationError)
  })
})

describe('RuleBuilder', () => {
  it('should leave blank balances alone when flagging zero balances', async () => {
    const engine = new RuleEngine(
      [RuleBuilder.create('zero-balance').when('Balance', 'equals', 0).setField('Dormant', true).build()],
      pino({ level: 'silent' })
    )

    const [blank, zero] = await engine.process([
      new DataRecord({ Balance: '' }),
      new DataRecord({ Balance: 0 }),
    ])

    expect(blank.has('Dormant')).toBe(false)
    expect(zero.get('Dormant')).toBe(true)
  })
})
