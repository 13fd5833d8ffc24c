/**
 * Rule Engine - ordered, cascading business rules over records
 *
 * Rules are kept in ascending priority (ties keep insertion order). For every
 * record each enabled rule is evaluated in turn and every rule whose predicate
 * holds has its action applied, so later rules observe earlier writes.
 */

import type { Logger } from 'pino'
import { DataRecord } from '../../records'
import { logger as rootLogger } from '../../observability'
import { RuleActionError, errorMessage, throwIfAborted } from '../../pipelines/errors'

export type RulePredicate = (record: DataRecord) => boolean
export type RuleAction = (record: DataRecord) => DataRecord | void | Promise<DataRecord | void>

export interface Rule {
  name: string
  priority: number
  predicate: RulePredicate
  action: RuleAction
  enabled?: boolean
  description?: string
  // No further rules run for a record once this one has fired
  stopProcessing?: boolean
}

export interface RuleEngineStatistics {
  totalRules: number
  enabledRules: number
  disabledRules: number
  rulesByPriority: Record<number, number>
  lastRun?: RuleRunStatistics
}

export interface RuleRunStatistics {
  recordsIn: number
  recordsOut: number
  rulesFired: number
  recordsSkipped: number
  actionErrors: number
  durationMs: number
}

export class RuleEngine {
  private readonly _rules: Rule[] = []
  private lastRun?: RuleRunStatistics
  private readonly logger: Logger

  constructor(rules: Rule[] = [], logger?: Logger) {
    this.logger = logger ?? rootLogger.child({ component: 'rule-engine' })
    for (const rule of rules) {
      this.addRule(rule)
    }
  }

  get rules(): readonly Rule[] {
    return this._rules
  }

  /**
   * Insert keeping ascending priority; equal priorities keep insertion order
   */
  addRule(rule: Rule): this {
    const index = this._rules.findIndex(existing => existing.priority > rule.priority)
    if (index === -1) {
      this._rules.push(rule)
    } else {
      this._rules.splice(index, 0, rule)
    }
    this.logger.debug({ rule: rule.name, priority: rule.priority }, 'Rule registered')
    return this
  }

  /**
   * Remove every rule with the given name
   */
  removeRule(name: string): boolean {
    let removed = false
    for (let i = this._rules.length - 1; i >= 0; i--) {
      if (this._rules[i].name === name) {
        this._rules.splice(i, 1)
        removed = true
      }
    }
    return removed
  }

  clearRules(): void {
    this._rules.length = 0
  }

  /**
   * Apply all rules to every record. Records flagged as skipped by a rule are
   * dropped from the output.
   */
  async process(records: Iterable<DataRecord>, signal?: AbortSignal): Promise<DataRecord[]> {
    const started = Date.now()
    const output: DataRecord[] = []
    const stats: RuleRunStatistics = {
      recordsIn: 0,
      recordsOut: 0,
      rulesFired: 0,
      recordsSkipped: 0,
      actionErrors: 0,
      durationMs: 0,
    }

    for (const input of records) {
      throwIfAborted(signal)
      stats.recordsIn++

      const record = await this.processRecord(input, stats, signal)
      if (record.skipped) {
        stats.recordsSkipped++
        continue
      }
      output.push(record)
    }

    stats.recordsOut = output.length
    stats.durationMs = Date.now() - started
    this.lastRun = stats
    this.logger.debug({ ...stats }, 'Rules applied')
    return output
  }

  private async processRecord(
    input: DataRecord,
    stats: RuleRunStatistics,
    signal?: AbortSignal
  ): Promise<DataRecord> {
    let record = input
    // field -> rule that last wrote it, for this record only
    const writers = new Map<string, string>()

    for (const rule of this._rules) {
      if (rule.enabled === false) continue
      throwIfAborted(signal)

      let matched: boolean
      try {
        matched = rule.predicate(record)
      } catch (error) {
        this.recordFailure(record, rule, 'predicate', error)
        stats.actionErrors++
        continue
      }
      if (!matched) continue

      const before = record.toObject()
      try {
        const result = await rule.action(record)
        if (result instanceof DataRecord) {
          record = result
        }
      } catch (error) {
        this.recordFailure(record, rule, 'action', error)
        stats.actionErrors++
        continue
      }
      stats.rulesFired++

      for (const field of changedFields(before, record)) {
        const previous = writers.get(field)
        if (previous !== undefined && previous !== rule.name) {
          this.logger.warn(
            { recordId: record.id, field, previousRule: previous, rule: rule.name },
            'Field overwritten by a later rule'
          )
        }
        writers.set(field, rule.name)
      }

      if (record.skipped || rule.stopProcessing) {
        break
      }
    }

    return record
  }

  private recordFailure(record: DataRecord, rule: Rule, phase: 'predicate' | 'action', error: unknown): void {
    const failure = new RuleActionError(`Rule "${rule.name}" ${phase} failed: ${errorMessage(error)}`, rule.name, {
      cause: error,
    })
    record.addError({
      code: failure.code,
      message: failure.message,
      source: `Rule: ${rule.name}`,
      severity: failure.severity,
    })
    this.logger.warn({ recordId: record.id, rule: rule.name, err: errorMessage(error) }, 'Rule failed for record')
  }

  getStatistics(): RuleEngineStatistics {
    const rulesByPriority: Record<number, number> = {}
    let enabledRules = 0
    for (const rule of this._rules) {
      rulesByPriority[rule.priority] = (rulesByPriority[rule.priority] ?? 0) + 1
      if (rule.enabled !== false) enabledRules++
    }
    return {
      totalRules: this._rules.length,
      enabledRules,
      disabledRules: this._rules.length - enabledRules,
      rulesByPriority,
      lastRun: this.lastRun,
    }
  }
}

function changedFields(before: Record<string, unknown>, after: DataRecord): string[] {
  const changed: string[] = []
  for (const [field, value] of after.entries()) {
    if (!Object.prototype.hasOwnProperty.call(before, field) || !Object.is(before[field], value)) {
      changed.push(field)
    }
  }
  for (const field of Object.keys(before)) {
    if (!after.has(field)) {
      changed.push(field)
    }
  }
  return changed
}
