import { describe, it, expect, vi } from 'vitest'
import type { JobsOptions } from 'bullmq'
import {
  BullMQEventPublisher,
  InMemoryEventPublisher,
  PIPELINE_EVENT_TYPES,
  createPipelineEvent,
} from '../../pipelines/pipeline-events'
import type { EventQueue, PipelineEvent } from '../../pipelines/pipeline-events'

/**
 * In-process stand-in for a BullMQ queue
 */
class FakeQueue implements EventQueue {
  readonly jobs: Array<{ name: string; data: PipelineEvent; opts?: JobsOptions }> = []
  closed = false

  constructor(readonly name: string) {}

  async add(name: string, data: PipelineEvent, opts?: JobsOptions): Promise<unknown> {
    this.jobs.push({ name, data, opts })
    return { id: opts?.jobId }
  }

  async close(): Promise<void> {
    this.closed = true
  }
}

describe('pipeline events', () => {
  it('should stamp events with an id and timestamp', () => {
    const event = createPipelineEvent('pipeline.started', 'p-1', 'e-1', { stageCount: 2 })

    expect(event).toMatchObject({ type: 'pipeline.started', pipelineId: 'p-1', executionId: 'e-1', payload: { stageCount: 2 } })
    expect(event.eventId).toMatch(/^[0-9a-f-]{36}$/)
    expect(Number.isNaN(Date.parse(event.timestamp))).toBe(false)
  })

  it('should list the lifecycle event types', () => {
    expect(PIPELINE_EVENT_TYPES).toEqual([
      'pipeline.started',
      'pipeline.completed',
      'pipeline.failed',
      'pipeline.stage.completed',
    ])
  })

  describe('InMemoryEventPublisher', () => {
    it('should filter stored events by type and execution', async () => {
      const publisher = new InMemoryEventPublisher()
      await publisher.publish(createPipelineEvent('pipeline.started', 'p', 'e1'))
      await publisher.publish(createPipelineEvent('pipeline.completed', 'p', 'e1'))
      await publisher.publish(createPipelineEvent('pipeline.started', 'p', 'e2'))

      expect(publisher.getEvents()).toHaveLength(3)
      expect(publisher.getEvents({ type: 'pipeline.started' }).map(e => e.executionId)).toEqual(['e1', 'e2'])
      expect(publisher.getEvents({ executionId: 'e1' }).map(e => e.type)).toEqual(['pipeline.started', 'pipeline.completed'])

      publisher.clear()
      expect(publisher.getEvents()).toEqual([])
    })

    it('should notify typed and wildcard subscribers until they unsubscribe', async () => {
      const publisher = new InMemoryEventPublisher()
      const typed = vi.fn()
      const all = vi.fn()
      const unsubscribe = publisher.subscribe('pipeline.failed', typed)
      publisher.subscribe('*', all)

      await publisher.publish(createPipelineEvent('pipeline.failed', 'p', 'e'))
      await publisher.publish(createPipelineEvent('pipeline.started', 'p', 'e'))
      unsubscribe()
      await publisher.publish(createPipelineEvent('pipeline.failed', 'p', 'e'))

      expect(typed).toHaveBeenCalledTimes(1)
      expect(all).toHaveBeenCalledTimes(3)
    })
  })

  describe('BullMQEventPublisher', () => {
    it('should add each event to a queue named after its type', async () => {
      const queues = new Map<string, FakeQueue>()
      const publisher = new BullMQEventPublisher(undefined, {
        queueFactory: name => {
          const queue = new FakeQueue(name)
          queues.set(name, queue)
          return queue
        },
      })
      const started = createPipelineEvent('pipeline.started', 'p', 'e')
      const stage = createPipelineEvent('pipeline.stage.completed', 'p', 'e', { stageName: 'load' })

      await publisher.publish(started)
      await publisher.publish(stage)
      await publisher.publish(createPipelineEvent('pipeline.started', 'p', 'e2'))

      expect(Array.from(queues.keys())).toEqual(['pipewright.pipeline.started', 'pipewright.pipeline.stage.completed'])
      const startedQueue = queues.get('pipewright.pipeline.started')
      expect(startedQueue?.jobs).toHaveLength(2)
      expect(startedQueue?.jobs[0]).toEqual({
        name: 'pipeline.started',
        data: started,
        opts: { jobId: started.eventId, removeOnComplete: true, removeOnFail: false },
      })
    })

    it('should honor a custom queue prefix', async () => {
      const names: string[] = []
      const publisher = new BullMQEventPublisher(undefined, {
        queuePrefix: 'etl-',
        queueFactory: name => {
          names.push(name)
          return new FakeQueue(name)
        },
      })

      await publisher.publish(createPipelineEvent('pipeline.failed', 'p', 'e'))

      expect(names).toEqual(['etl-pipeline.failed'])
    })

    it('should close every queue it opened', async () => {
      const created: FakeQueue[] = []
      const publisher = new BullMQEventPublisher(undefined, {
        queueFactory: name => {
          const queue = new FakeQueue(name)
          created.push(queue)
          return queue
        },
      })
      await publisher.publish(createPipelineEvent('pipeline.started', 'p', 'e'))
      await publisher.publish(createPipelineEvent('pipeline.completed', 'p', 'e'))

      await publisher.close()

      expect(created.map(q => q.closed)).toEqual([true, true])
    })

    it('should require a connection when no factory is given', async () => {
      const publisher = new BullMQEventPublisher(undefined)

      await expect(publisher.publish(createPipelineEvent('pipeline.started', 'p', 'e'))).rejects.toThrow(
        'BullMQEventPublisher requires a Redis connection or a queueFactory'
      )
    })
  })
})
