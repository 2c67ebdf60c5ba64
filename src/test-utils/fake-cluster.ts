import { vi } from 'vitest'

import {
  type ClusterOperator,
  type ClusterOperatorStore,
  cloneClusterOperatorStatus,
} from '~/server/status-manager/cluster-operator'
import type { StatusLogger } from '~/server/status-manager/logger'
import type {
  DaemonSetState,
  DeploymentState,
  WorkloadInspector,
  WorkloadRef,
} from '~/server/status-manager/workload-status'

const cloneResource = (resource: ClusterOperator): ClusterOperator => ({
  ...resource,
  metadata: { ...resource.metadata },
  status: cloneClusterOperatorStatus(resource.status),
})

export const createFakeClusterOperatorStore = (initial?: ClusterOperator) => {
  let stored: ClusterOperator | null = initial ? cloneResource(initial) : null
  let resourceVersion = 1

  const store = {
    get: vi.fn<ClusterOperatorStore['get']>(async () => (stored ? cloneResource(stored) : null)),
    create: vi.fn<ClusterOperatorStore['create']>(async (resource) => {
      stored = cloneResource(resource)
      stored.metadata.resourceVersion = String(resourceVersion++)
    }),
    updateStatus: vi.fn<ClusterOperatorStore['updateStatus']>(async (resource) => {
      stored = cloneResource(resource)
      stored.metadata.resourceVersion = String(resourceVersion++)
    }),
  } satisfies ClusterOperatorStore

  return {
    store,
    current: () => stored,
    writes: () => store.create.mock.calls.length + store.updateStatus.mock.calls.length,
  }
}

const refKey = (ref: WorkloadRef) => `${ref.namespace}/${ref.name}`

export const readyDaemonSet = (overrides: Partial<DaemonSetState> = {}): DaemonSetState => ({
  generation: 1,
  observedGeneration: 1,
  desiredNumberScheduled: 3,
  updatedNumberScheduled: 3,
  numberUnavailable: 0,
  numberAvailable: 3,
  annotations: { 'release.openshift.io/version': '4.16.0' },
  ...overrides,
})

export const readyDeployment = (overrides: Partial<DeploymentState> = {}): DeploymentState => ({
  generation: 2,
  observedGeneration: 2,
  replicas: 2,
  updatedReplicas: 2,
  availableReplicas: 2,
  unavailableReplicas: 0,
  annotations: { 'release.openshift.io/version': '4.16.0' },
  ...overrides,
})

export const createFakeWorkloadInspector = (workloads: {
  daemonSets?: Record<string, DaemonSetState>
  deployments?: Record<string, DeploymentState>
}) => {
  const inspector = {
    getDaemonSet: vi.fn<WorkloadInspector['getDaemonSet']>(async (ref) => {
      const state = workloads.daemonSets?.[refKey(ref)]
      if (!state) throw new Error(`daemonsets.apps "${ref.name}" not found`)
      return state
    }),
    getDeployment: vi.fn<WorkloadInspector['getDeployment']>(async (ref) => {
      const state = workloads.deployments?.[refKey(ref)]
      if (!state) throw new Error(`deployments.apps "${ref.name}" not found`)
      return state
    }),
  } satisfies WorkloadInspector
  return inspector
}

export const createRecordingLogger = () => {
  const logger = {
    info: vi.fn<StatusLogger['info']>(),
    warn: vi.fn<StatusLogger['warn']>(),
  } satisfies StatusLogger
  return logger
}
