import { describe, it, expect, beforeEach } from 'vitest'
import { InMemoryMetrics, Observability } from '../../observability'

describe('InMemoryMetrics', () => {
  let metrics: InMemoryMetrics

  beforeEach(() => {
    metrics = new InMemoryMetrics()
  })

  it('should key counters by sorted labels', () => {
    metrics.increment('stage.runs', 1, { stage: 'load', pipeline: 'p' })
    metrics.increment('stage.runs', 2, { pipeline: 'p', stage: 'load' })

    expect(metrics.getCounter('stage.runs', { stage: 'load', pipeline: 'p' })).toBe(3)
    expect(metrics.getCounter('stage.runs')).toBe(0)
  })

  it('should keep the last gauge value', () => {
    metrics.gauge('pipelines.running', 2)
    metrics.gauge('pipelines.running', 1)

    expect(metrics.getGauge('pipelines.running')).toBe(1)
  })

  it('should accumulate timings and clear on reset', () => {
    metrics.timing('stage.duration', 40)
    metrics.timing('stage.duration', 2)
    expect(metrics.getCounter('stage.duration')).toBe(42)

    metrics.reset()
    expect(metrics.getCounter('stage.duration')).toBe(0)
  })
})

describe('Observability', () => {
  const obs = Observability.getInstance()

  it('should return a single instance', () => {
    expect(Observability.getInstance()).toBe(obs)
  })

  it('should bind context on child loggers', () => {
    const child = obs.createChildLogger({ pipelineId: 'p-1' })

    expect(child.bindings()).toMatchObject({ pipelineId: 'p-1' })
  })
})
