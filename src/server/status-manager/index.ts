import { Context, Effect, Layer } from 'effect'

import { type ClusterOperatorStore, normalizeObjectReference, type ObjectReference } from './cluster-operator'
import { OperatorCondition } from './conditions'
import {
  buildDegradedCondition,
  createDegradedLevelTracker,
  describeStatusLevel,
  StatusLevel,
} from './degraded-levels'
import type { StatusManagerConfig } from './env-config'
import { createConsoleLogger, type StatusLogger } from './logger'
import { createStatusPublisher, type Status } from './status-publisher'
import { evaluateWorkloads, type WorkloadInspector, type WorkloadRef } from './workload-status'

export type StatusManagerDeps = {
  store: ClusterOperatorStore
  inspector: WorkloadInspector
  config: Pick<StatusManagerConfig, 'name' | 'releaseVersion'> & Partial<StatusManagerConfig>
  logger?: StatusLogger
  nowIso?: () => string
}

export type StatusManagerHealth = {
  name: string
  releaseVersion: string
  degradedLevel: string | null
  daemonSets: number
  deployments: number
  relatedObjects: number
  pendingStatuses: number
  publisherRunning: boolean
}

export type StatusManager = {
  setDegraded: (level: StatusLevel, reason: string, message: string) => Promise<void>
  setNotDegraded: (level: StatusLevel) => Promise<void>
  setDaemonSets: (daemonSets: WorkloadRef[]) => void
  setDeployments: (deployments: WorkloadRef[]) => void
  setRelatedObjects: (relatedObjects: ObjectReference[]) => void
  setFromPods: () => Promise<void>
  getHealth: () => StatusManagerHealth
  drain: () => Promise<void>
  stop: () => Promise<void>
}

/**
 * Coordinates changes to one ClusterOperator's status. Degraded levels and workload lists live in
 * memory; every change that should become visible is turned into a `Status` and handed to the
 * single publisher worker.
 */
export const createStatusManager = (deps: StatusManagerDeps): StatusManager => {
  const { config, inspector } = deps
  const logger = deps.logger ?? createConsoleLogger()
  const tracker = createDegradedLevelTracker()
  let daemonSets: WorkloadRef[] = [...(config.daemonSets ?? [])]
  let deployments: WorkloadRef[] = [...(config.deployments ?? [])]
  let relatedObjects: ObjectReference[] = []

  const publisher = createStatusPublisher({
    store: deps.store,
    name: config.name,
    component: config.component ?? config.name,
    releaseVersion: config.releaseVersion,
    relatedObjects: () => relatedObjects,
    logger,
    capacity: config.queueCapacity,
    nowIso: deps.nowIso,
  })

  const syncDegraded = () =>
    publisher.enqueue({
      reachedAvailableLevel: false,
      conditions: [tracker.resolve()],
    })

  const setDegraded = (level: StatusLevel, reason: string, message: string) => {
    tracker.setLevel(level, buildDegradedCondition(reason, message))
    return syncDegraded()
  }

  const setNotDegraded = (level: StatusLevel) => {
    tracker.setLevel(level, null)
    return syncDegraded()
  }

  const setFromPods = async () => {
    // Fetch failures below count as progressing; the reconciler owning the workloads reports
    // Degraded on its own level when it cannot create them.
    await setNotDegraded(StatusLevel.PodDeployment)

    const { reachedAvailableLevel, progressing } = await evaluateWorkloads({
      inspector,
      daemonSets,
      deployments,
      targetVersion: config.releaseVersion,
      versionAnnotation: config.versionAnnotation,
      logger,
    })

    const status: Status =
      progressing.length > 0
        ? {
            reachedAvailableLevel,
            conditions: [
              {
                type: OperatorCondition.Progressing,
                status: 'True',
                reason: 'Deploying',
                message: progressing.join('\n'),
              },
            ],
          }
        : {
            reachedAvailableLevel,
            conditions: [
              { type: OperatorCondition.Progressing, status: 'False' },
              { type: OperatorCondition.Available, status: 'True' },
            ],
          }
    await publisher.enqueue(status)
  }

  const getHealth = (): StatusManagerHealth => {
    const level = tracker.activeLevel()
    return {
      name: config.name,
      releaseVersion: config.releaseVersion,
      degradedLevel: level === null ? null : describeStatusLevel(level),
      daemonSets: daemonSets.length,
      deployments: deployments.length,
      relatedObjects: relatedObjects.length,
      pendingStatuses: publisher.pending(),
      publisherRunning: publisher.isRunning(),
    }
  }

  return {
    setDegraded,
    setNotDegraded,
    setDaemonSets: (next) => {
      daemonSets = [...next]
    },
    setDeployments: (next) => {
      deployments = [...next]
    },
    setRelatedObjects: (next) => {
      relatedObjects = next.map(normalizeObjectReference)
    },
    setFromPods,
    getHealth,
    drain: publisher.drain,
    stop: publisher.stop,
  }
}

export class StatusManagerService extends Context.Tag('StatusManagerService')<StatusManagerService, StatusManager>() {}

export const makeStatusManagerLayer = (deps: StatusManagerDeps) =>
  Layer.scoped(
    StatusManagerService,
    Effect.gen(function* () {
      const manager = createStatusManager(deps)
      yield* Effect.addFinalizer(() => Effect.promise(() => manager.stop()))
      return manager
    }),
  )

export { StatusLevel } from './degraded-levels'
export type { Status } from './status-publisher'
export type { WorkloadRef } from './workload-status'
