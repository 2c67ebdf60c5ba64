import { Effect, Exit, Fiber, Queue } from 'effect'
import YAML from 'yaml'

import { formatError } from '~/server/object-utils'
import { shouldApplyStatus } from '~/server/status-utils'

import {
  buildClusterOperator,
  type ClusterOperator,
  type ClusterOperatorStatus,
  type ClusterOperatorStore,
  cloneClusterOperatorStatus,
  normalizeObjectReference,
  type ObjectReference,
} from './cluster-operator'
import { type Condition, type ConditionUpdate, findCondition, OperatorCondition, upsertCondition } from './conditions'
import type { StatusLogger } from './logger'

export const DEFAULT_STATUS_QUEUE_CAPACITY = 5
export const OPERATOR_VERSION_NAME = 'operator'

/** One unit of work for the publisher, built from in-memory state at enqueue time. */
export type Status = {
  conditions: ConditionUpdate[]
  reachedAvailableLevel: boolean
}

export class StatusPublisherStoppedError extends Error {
  constructor() {
    super('status publisher is stopped')
    this.name = 'StatusPublisherStoppedError'
  }
}

export type ApplyStatusOptions = {
  relatedObjects: readonly ObjectReference[]
  releaseVersion: string
  component: string
  nowIso?: () => string
}

export const applyStatus = (
  current: ClusterOperatorStatus,
  status: Status,
  options: ApplyStatusOptions,
): ClusterOperatorStatus => {
  const next = cloneClusterOperatorStatus(current)
  next.relatedObjects = options.relatedObjects.map(normalizeObjectReference)

  if (status.reachedAvailableLevel) {
    next.versions = options.releaseVersion ? [{ name: OPERATOR_VERSION_NAME, version: options.releaseVersion }] : []
  }

  let conditions = next.conditions
  for (const condition of status.conditions) {
    conditions = upsertCondition(conditions, condition, options.nowIso)
  }

  // Progressing must never be reported before Available has been set at least once.
  const progressing = findCondition(conditions, OperatorCondition.Progressing)
  const available = findCondition(conditions, OperatorCondition.Available)
  if (!available && progressing?.status === 'True') {
    conditions = upsertCondition(
      conditions,
      {
        type: OperatorCondition.Available,
        status: 'False',
        reason: 'Startup',
        message: `The ${options.component} is starting up`,
      },
      options.nowIso,
    )
  }

  conditions = upsertCondition(conditions, { type: OperatorCondition.Upgradeable, status: 'True' }, options.nowIso)
  next.conditions = conditions
  return next
}

export const renderConditions = (conditions: Condition[]) => {
  try {
    return YAML.stringify(conditions)
  } catch (error) {
    return `(failed to convert to YAML: ${formatError(error)})`
  }
}

export type StatusPublisherOptions = {
  store: ClusterOperatorStore
  name: string
  component: string
  releaseVersion: string
  relatedObjects: () => readonly ObjectReference[]
  logger: StatusLogger
  capacity?: number
  nowIso?: () => string
}

export type StatusPublisher = {
  enqueue: (status: Status) => Promise<void>
  drain: () => Promise<void>
  stop: () => Promise<void>
  pending: () => number
  isRunning: () => boolean
}

export const createStatusPublisher = (options: StatusPublisherOptions): StatusPublisher => {
  const capacity = Math.max(1, options.capacity ?? DEFAULT_STATUS_QUEUE_CAPACITY)
  const queue = Effect.runSync(Queue.bounded<Status>(capacity))
  const { logger, name, store } = options
  let pending = 0
  let stopped = false

  const write = async (isNotFound: boolean, resource: ClusterOperator) => {
    const rendered = renderConditions(resource.status.conditions)
    if (isNotFound) {
      try {
        await store.create(resource)
        logger.info(`Created ClusterOperator with conditions:\n${rendered}`)
      } catch (error) {
        logger.warn(`Failed to create ClusterOperator "${name}"`, { error: formatError(error) })
      }
      return
    }
    try {
      await store.updateStatus(resource)
      logger.info(`Updated ClusterOperator with conditions:\n${rendered}`)
    } catch (error) {
      logger.warn(`Failed to update ClusterOperator "${name}"`, { error: formatError(error) })
    }
  }

  const publish = async (status: Status) => {
    let existing: ClusterOperator | null
    try {
      existing = await store.get(name)
    } catch (error) {
      logger.warn(`Failed to get ClusterOperator "${name}"`, { error: formatError(error) })
      return
    }

    const resource = existing ?? buildClusterOperator(name)
    const nextStatus = applyStatus(resource.status, status, {
      relatedObjects: options.relatedObjects(),
      releaseVersion: options.releaseVersion,
      component: options.component,
      nowIso: options.nowIso,
    })
    if (!shouldApplyStatus(resource.status, nextStatus)) return

    await write(existing === null, { ...resource, status: nextStatus })
  }

  // Interrupting the worker does not cancel a cycle that has already started, so stop() waits on it.
  let inFlight: Promise<void> | null = null

  const runCycle = async (status: Status) => {
    try {
      await publish(status)
    } catch (error) {
      logger.warn('status publish cycle failed', { error: formatError(error) })
    }
  }

  const worker = Effect.forever(
    Queue.take(queue).pipe(
      Effect.flatMap((status) =>
        Effect.promise(() => {
          const cycle = runCycle(status)
          inFlight = cycle
          return cycle
        }).pipe(
          Effect.ensuring(
            Effect.sync(() => {
              pending -= 1
            }),
          ),
        ),
      ),
    ),
  )
  const fiber = Effect.runFork(worker)

  const enqueue = async (status: Status) => {
    if (stopped) throw new StatusPublisherStoppedError()
    pending += 1
    // A full queue suspends the offer until the worker frees a slot.
    const exit = await Effect.runPromiseExit(Queue.offer(queue, status))
    if (Exit.isFailure(exit) || !exit.value) {
      pending -= 1
      throw new StatusPublisherStoppedError()
    }
  }

  const drain = () =>
    new Promise<void>((resolve) => {
      const check = () => {
        if (pending <= 0 || stopped) {
          resolve()
          return
        }
        setTimeout(check, 5)
      }
      check()
    })

  /**
   * Stops taking work and resolves once the cycle in progress, if any, has finished its write.
   * Statuses still queued are discarded and suspended `enqueue` calls reject.
   */
  const stop = async () => {
    if (stopped) return
    stopped = true
    await Effect.runPromise(Fiber.interrupt(fiber))
    if (inFlight) await inFlight
    await Effect.runPromise(Queue.shutdown(queue))
    pending = 0
  }

  return {
    enqueue,
    drain,
    stop,
    pending: () => pending,
    isRunning: () => !stopped,
  }
}
