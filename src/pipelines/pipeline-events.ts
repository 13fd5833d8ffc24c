/**
 * Pipeline lifecycle events
 *
 * The orchestrator emits started / completed / failed / stage.completed.
 * Delivery is best effort: publishers may be slow or fail, and the
 * orchestrator only waits up to its event timeout.
 */

import { Queue } from 'bullmq'
import type { JobsOptions } from 'bullmq'
import type { Redis } from 'ioredis'
import { v4 as uuidv4 } from 'uuid'

export const PIPELINE_EVENT_TYPES = [
  'pipeline.started',
  'pipeline.completed',
  'pipeline.failed',
  'pipeline.stage.completed',
] as const

export type PipelineEventType = (typeof PIPELINE_EVENT_TYPES)[number]

export interface PipelineEvent {
  eventId: string
  type: PipelineEventType
  pipelineId: string
  executionId: string
  timestamp: string
  payload: Record<string, unknown>
}

export function createPipelineEvent(
  type: PipelineEventType,
  pipelineId: string,
  executionId: string,
  payload: Record<string, unknown> = {}
): PipelineEvent {
  return {
    eventId: uuidv4(),
    type,
    pipelineId,
    executionId,
    timestamp: new Date().toISOString(),
    payload,
  }
}

export interface PipelineEventPublisher {
  publish(event: PipelineEvent): Promise<void>
}

export type PipelineEventHandler = (event: PipelineEvent) => void | Promise<void>

/**
 * InMemoryEventPublisher - keeps every event and fans out to subscribers
 */
export class InMemoryEventPublisher implements PipelineEventPublisher {
  private readonly events: PipelineEvent[] = []
  private readonly handlers = new Map<PipelineEventType | '*', Set<PipelineEventHandler>>()

  async publish(event: PipelineEvent): Promise<void> {
    this.events.push(event)
    const handlers = [...(this.handlers.get(event.type) ?? []), ...(this.handlers.get('*') ?? [])]
    for (const handler of handlers) {
      await handler(event)
    }
  }

  /**
   * Subscribe to one event type, or '*' for all; returns an unsubscribe function
   */
  subscribe(type: PipelineEventType | '*', handler: PipelineEventHandler): () => void {
    let handlers = this.handlers.get(type)
    if (!handlers) {
      handlers = new Set()
      this.handlers.set(type, handlers)
    }
    handlers.add(handler)
    return () => {
      this.handlers.get(type)?.delete(handler)
    }
  }

  getEvents(filter?: { type?: PipelineEventType; executionId?: string }): PipelineEvent[] {
    return this.events.filter(
      event =>
        (!filter?.type || event.type === filter.type) &&
        (!filter?.executionId || event.executionId === filter.executionId)
    )
  }

  clear(): void {
    this.events.length = 0
  }
}

/**
 * The slice of a BullMQ queue the publisher needs
 */
export interface EventQueue {
  add(name: string, data: PipelineEvent, opts?: JobsOptions): Promise<unknown>
  close(): Promise<void>
}

export interface BullMQEventPublisherOptions {
  queuePrefix?: string
  // Overrides queue creation (tests use an in-process stand-in)
  queueFactory?: (queueName: string) => EventQueue
}

/**
 * BullMQEventPublisher - one queue per event type ("<prefix><type>", e.g. pipewright.pipeline.started),
 * job id = event id so re-published events are deduplicated
 */
export class BullMQEventPublisher implements PipelineEventPublisher {
  private readonly queues = new Map<string, EventQueue>()
  private readonly queuePrefix: string
  private readonly queueFactory: (queueName: string) => EventQueue

  constructor(connection: Redis | undefined, options: BullMQEventPublisherOptions = {}) {
    this.queuePrefix = options.queuePrefix ?? 'pipewright.'
    this.queueFactory =
      options.queueFactory ??
      (queueName => {
        if (!connection) {
          throw new Error('BullMQEventPublisher requires a Redis connection or a queueFactory')
        }
        return new Queue(queueName, { connection })
      })
  }

  async publish(event: PipelineEvent): Promise<void> {
    const queue = this.getOrCreateQueue(this.queuePrefix + event.type)
    await queue.add(event.type, event, {
      jobId: event.eventId,
      removeOnComplete: true,
      removeOnFail: false,
    })
  }

  async close(): Promise<void> {
    await Promise.all(Array.from(this.queues.values()).map(queue => queue.close()))
    this.queues.clear()
  }

  private getOrCreateQueue(queueName: string): EventQueue {
    let queue = this.queues.get(queueName)
    if (!queue) {
      queue = this.queueFactory(queueName)
      this.queues.set(queueName, queue)
    }
    return queue
  }
}
