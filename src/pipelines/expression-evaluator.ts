/**
 * Expression Evaluator for stage conditions, rule predicates and conditional mappings
 *
 * Supports:
 * - JSONPath value extraction: $.variables.records.length, $.CustomerType
 * - Comparisons: ==, !=, >, <, >=, <=
 * - Logical operators: &&, || (evaluated left to right)
 * - Literals: strings ("value" or 'value'), numbers (123), booleans, null
 * - A lone operand is tested for truthiness: $.variables.ready
 */

import jp from 'jsonpath'
import { logger } from '../observability'

const COMPARISON_OPERATORS = new Set(['==', '!=', '>', '<', '>=', '<='])

export class ExpressionEvaluator {
  /**
   * Evaluate a condition expression against a context
   */
  static evaluate(expression: string, context: object): boolean {
    try {
      const tokens = this.tokenize(expression)
      return this.evaluateTokens(tokens, context)
    } catch (error) {
      logger.error({ err: error, expression }, 'Failed to evaluate expression')
      return false
    }
  }

  /**
   * Resolve a single operand (JSONPath or literal) against a context
   */
  static resolve(token: string, context: object): unknown {
    return this.getValue(token.trim(), context)
  }

  /**
   * Throws when the expression cannot be tokenized into operand/operator groups
   */
  static validate(expression: string): void {
    const tokens = this.tokenize(expression)
    if (tokens.length === 0) {
      throw new Error('Expression is empty')
    }
    for (const clause of this.splitClauses(tokens)) {
      if (clause.length !== 1 && clause.length !== 3) {
        throw new Error(`Malformed clause "${clause.join(' ')}" in expression: ${expression}`)
      }
      if (clause.length === 3 && !COMPARISON_OPERATORS.has(clause[1])) {
        throw new Error(`Unknown operator "${clause[1]}" in expression: ${expression}`)
      }
    }
  }

  /**
   * Tokenize expression, keeping quoted strings intact
   */
  private static tokenize(expr: string): string[] {
    const tokens: string[] = []
    const pattern = /"[^"]*"|'[^']*'|&&|\|\||==|!=|>=|<=|>|<|[^\s<>=!&|]+/g
    let match: RegExpExecArray | null
    while ((match = pattern.exec(expr)) !== null) {
      tokens.push(match[0])
    }
    return tokens
  }

  private static splitClauses(tokens: string[]): string[][] {
    const clauses: string[][] = [[]]
    for (const token of tokens) {
      if (token === '&&' || token === '||') {
        clauses.push([])
      } else {
        clauses[clauses.length - 1].push(token)
      }
    }
    return clauses
  }

  /**
   * Evaluate tokenized expression
   */
  private static evaluateTokens(tokens: string[], context: object): boolean {
    let result = true
    let currentOp = '&&'
    let i = 0

    while (i < tokens.length) {
      if (tokens[i] === '&&' || tokens[i] === '||') {
        currentOp = tokens[i]
        i++
        continue
      }

      let clauseResult: boolean
      if (i + 2 < tokens.length && COMPARISON_OPERATORS.has(tokens[i + 1])) {
        const leftVal = this.getValue(tokens[i], context)
        const rightVal = this.getValue(tokens[i + 2], context)
        clauseResult = this.compare(leftVal, tokens[i + 1], rightVal)
        i += 3
      } else {
        clauseResult = Boolean(this.getValue(tokens[i], context))
        i += 1
      }

      result = currentOp === '&&' ? result && clauseResult : result || clauseResult
    }

    return result
  }

  /**
   * Get value from token (JSONPath, literal, or boolean)
   */
  private static getValue(token: string, context: object): unknown {
    if (token === '$' || token.startsWith('$.') || token.startsWith('$[')) {
      return jp.value(context, token)
    }

    if ((token.startsWith('"') && token.endsWith('"')) || (token.startsWith("'") && token.endsWith("'"))) {
      return token.slice(1, -1)
    }

    if (token === 'true') return true
    if (token === 'false') return false
    if (token === 'null') return null

    if (token.trim() !== '' && !isNaN(Number(token))) {
      return Number(token)
    }

    return token
  }

  /**
   * Compare two values with an operator
   */
  private static compare(left: unknown, op: string, right: unknown): boolean {
    switch (op) {
      case '==':
        return looselyEqual(left, right)
      case '!=':
        return !looselyEqual(left, right)
      case '>':
        return compareOrdered(left, right, (a, b) => a > b)
      case '<':
        return compareOrdered(left, right, (a, b) => a < b)
      case '>=':
        return compareOrdered(left, right, (a, b) => a >= b)
      case '<=':
        return compareOrdered(left, right, (a, b) => a <= b)
      default:
        logger.warn({ op }, 'Unknown operator')
        return false
    }
  }
}

/**
 * Equality with number/string coercion ("5" == 5), null and undefined equal.
 * Blank strings and objects never equal a number.
 */
export function looselyEqual(left: unknown, right: unknown): boolean {
  if (left == null || right == null) {
    return left == null && right == null
  }
  if (typeof left === 'number' || typeof right === 'number') {
    const a = toNumeric(left)
    const b = toNumeric(right)
    return a !== undefined && b !== undefined && a === b
  }
  if (typeof left === 'boolean' || typeof right === 'boolean') {
    return String(left) === String(right)
  }
  if (left instanceof Date || right instanceof Date) {
    return toComparable(left) === toComparable(right)
  }
  return left === right
}

function toNumeric(value: unknown): number | undefined {
  if (typeof value === 'number') return value
  if (typeof value === 'boolean') return value ? 1 : 0
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value)
    return Number.isNaN(parsed) ? undefined : parsed
  }
  return undefined
}

type Comparable = number | string

function toComparable(value: unknown): Comparable | undefined {
  if (typeof value === 'number') return value
  if (value instanceof Date) return value.getTime()
  if (typeof value === 'string') return value
  if (typeof value === 'boolean') return value ? 1 : 0
  return undefined
}

/**
 * Ordered comparison; numeric when both sides parse as numbers, otherwise
 * string comparison. Missing values never compare.
 */
export function compareOrdered(
  left: unknown,
  right: unknown,
  predicate: (a: Comparable, b: Comparable) => boolean
): boolean {
  const a = toComparable(left)
  const b = toComparable(right)
  if (a === undefined || b === undefined) {
    return false
  }
  const numA = Number(a)
  const numB = Number(b)
  if (!isNaN(numA) && !isNaN(numB) && a !== '' && b !== '') {
    return predicate(numA, numB)
  }
  return predicate(String(a), String(b))
}
