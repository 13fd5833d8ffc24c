/**
 * Rule Builder - declarative conditions and actions compiled into Rules
 *
 * Lets rules come from configuration instead of code:
 *
 *   RuleBuilder.create('premium-discount')
 *     .priority(1)
 *     .when('CustomerType', 'equals', 'Premium')
 *     .setField('Discount', 0.1)
 *     .build()
 */

import type { DataRecord } from '../../records'
import { ConfigurationError } from '../../pipelines/errors'
import { ExpressionEvaluator, compareOrdered, looselyEqual } from '../../pipelines/expression-evaluator'
import type { TransformDefinition, TransformRegistry } from '../mapping/field-transformations'
import { fieldTransforms } from '../mapping/field-transformations'
import type { Rule, RulePredicate } from './rule-engine'

export const CONDITION_OPERATORS = [
  'equals',
  'notEquals',
  'greaterThan',
  'greaterThanOrEqual',
  'lessThan',
  'lessThanOrEqual',
  'contains',
  'startsWith',
  'endsWith',
  'regex',
  'isNullOrEmpty',
  'isNotNullOrEmpty',
  'in',
  'notIn',
] as const

export type ConditionOperator = (typeof CONDITION_OPERATORS)[number]

export interface ConditionDefinition {
  field: string
  operator: ConditionOperator
  value?: unknown
}

export type ActionDefinition =
  | { type: 'setField'; field: string; value?: unknown }
  | { type: 'removeField'; field: string }
  | { type: 'copyField'; from: string; to: string }
  | { type: 'transformField'; field: string; transform: TransformDefinition | string; target?: string }
  | { type: 'skipRecord' }
  | { type: 'stopProcessing' }

export interface RuleDefinition {
  name: string
  priority?: number
  enabled?: boolean
  description?: string
  // All conditions must hold
  conditions?: ConditionDefinition[]
  // Optional expression over the record's fields, e.g. $.Total > 100
  when?: string
  actions: ActionDefinition[]
}

type RecordAction = (record: DataRecord) => void | Promise<void>

function isNullOrEmpty(value: unknown): boolean {
  return value == null || (typeof value === 'string' && value.trim() === '') || (Array.isArray(value) && value.length === 0)
}

function asList(operator: ConditionOperator, value: unknown): unknown[] {
  if (!Array.isArray(value)) {
    throw new ConfigurationError(`Operator "${operator}" requires an array value`)
  }
  return value
}

/**
 * Compile one condition into a record predicate
 */
export function compileCondition(condition: ConditionDefinition): RulePredicate {
  const { field, operator, value } = condition

  switch (operator) {
    case 'equals':
      return record => looselyEqual(record.get(field), value)
    case 'notEquals':
      return record => !looselyEqual(record.get(field), value)
    case 'greaterThan':
      return record => compareOrdered(record.get(field), value, (a, b) => a > b)
    case 'greaterThanOrEqual':
      return record => compareOrdered(record.get(field), value, (a, b) => a >= b)
    case 'lessThan':
      return record => compareOrdered(record.get(field), value, (a, b) => a < b)
    case 'lessThanOrEqual':
      return record => compareOrdered(record.get(field), value, (a, b) => a <= b)
    case 'contains':
      return record => {
        const actual = record.get(field)
        if (Array.isArray(actual)) return actual.some(item => looselyEqual(item, value))
        return actual != null && String(actual).includes(String(value))
      }
    case 'startsWith':
      return record => {
        const actual = record.get(field)
        return actual != null && String(actual).startsWith(String(value))
      }
    case 'endsWith':
      return record => {
        const actual = record.get(field)
        return actual != null && String(actual).endsWith(String(value))
      }
    case 'regex': {
      let pattern: RegExp
      try {
        pattern = new RegExp(String(value))
      } catch (error) {
        throw new ConfigurationError(`Invalid regex for field "${field}": ${String(value)}`, { issues: [String(error)] })
      }
      return record => {
        const actual = record.get(field)
        return actual != null && pattern.test(String(actual))
      }
    }
    case 'isNullOrEmpty':
      return record => isNullOrEmpty(record.get(field))
    case 'isNotNullOrEmpty':
      return record => !isNullOrEmpty(record.get(field))
    case 'in': {
      const list = asList(operator, value)
      return record => list.some(item => looselyEqual(record.get(field), item))
    }
    case 'notIn': {
      const list = asList(operator, value)
      return record => !list.some(item => looselyEqual(record.get(field), item))
    }
  }
}

export class RuleBuilder {
  private _priority = 0
  private _enabled = true
  private _description?: string
  private _stopProcessing = false
  private readonly predicates: RulePredicate[] = []
  private readonly actions: RecordAction[] = []

  private constructor(
    private readonly name: string,
    private readonly transforms: TransformRegistry
  ) {}

  static create(name: string, transforms: TransformRegistry = fieldTransforms): RuleBuilder {
    return new RuleBuilder(name, transforms)
  }

  priority(priority: number): this {
    this._priority = priority
    return this
  }

  enabled(enabled = true): this {
    this._enabled = enabled
    return this
  }

  description(description: string): this {
    this._description = description
    return this
  }

  when(field: string, operator: ConditionOperator, value?: unknown): this {
    this.predicates.push(compileCondition({ field, operator, value }))
    return this
  }

  whenExpression(expression: string): this {
    ExpressionEvaluator.validate(expression)
    this.predicates.push(record => ExpressionEvaluator.evaluate(expression, record.toObject()))
    return this
  }

  where(predicate: RulePredicate): this {
    this.predicates.push(predicate)
    return this
  }

  setField(field: string, value: unknown): this {
    return this.perform(record => {
      record.set(field, value)
    })
  }

  removeField(field: string): this {
    return this.perform(record => {
      record.remove(field)
    })
  }

  copyField(from: string, to: string): this {
    return this.perform(record => {
      if (record.has(from)) {
        record.set(to, record.get(from))
      }
    })
  }

  transformField(field: string, transform: TransformDefinition | string, target = field): this {
    const fn = this.transforms.create(transform)
    return this.perform(record => {
      record.set(target, fn(record.get(field), record))
    })
  }

  skipRecord(): this {
    return this.perform(record => {
      record.skipped = true
    })
  }

  stopProcessing(): this {
    this._stopProcessing = true
    return this
  }

  perform(action: RecordAction): this {
    this.actions.push(action)
    return this
  }

  build(): Rule {
    if (this.actions.length === 0 && !this._stopProcessing) {
      throw new ConfigurationError(`Rule "${this.name}" has no actions`)
    }

    const predicates = [...this.predicates]
    const actions = [...this.actions]

    return {
      name: this.name,
      priority: this._priority,
      enabled: this._enabled,
      description: this._description,
      stopProcessing: this._stopProcessing,
      predicate: record => predicates.every(predicate => predicate(record)),
      action: async record => {
        for (const action of actions) {
          await action(record)
        }
      },
    }
  }
}

/**
 * Compile a declarative rule definition
 */
export function compileRule(definition: RuleDefinition, transforms: TransformRegistry = fieldTransforms): Rule {
  const builder = RuleBuilder.create(definition.name, transforms)
    .priority(definition.priority ?? 0)
    .enabled(definition.enabled ?? true)

  if (definition.description) builder.description(definition.description)
  if (definition.when) builder.whenExpression(definition.when)

  for (const condition of definition.conditions ?? []) {
    builder.when(condition.field, condition.operator, condition.value)
  }

  for (const action of definition.actions) {
    switch (action.type) {
      case 'setField':
        builder.setField(action.field, action.value ?? null)
        break
      case 'removeField':
        builder.removeField(action.field)
        break
      case 'copyField':
        builder.copyField(action.from, action.to)
        break
      case 'transformField':
        builder.transformField(action.field, action.transform, action.target)
        break
      case 'skipRecord':
        builder.skipRecord()
        break
      case 'stopProcessing':
        builder.stopProcessing()
        break
    }
  }

  return builder.build()
}
