import type { KubeConfig } from '@kubernetes/client-node'

import { createClusterOperatorStore, createWorkloadInspector } from '~/server/status-kube'
import { resolveStatusManagerConfig } from '~/server/status-manager/env-config'
import { createStatusManager, type StatusManager } from '~/server/status-manager'
import { createConsoleLogger, type StatusLogger } from '~/server/status-manager/logger'

export const createStatusManagerFromEnvironment = (
  options: { env?: Record<string, string | undefined>; kubeConfig?: KubeConfig; logger?: StatusLogger } = {},
): StatusManager => {
  const logger = options.logger ?? createConsoleLogger()
  const config = resolveStatusManagerConfig(options.env ?? process.env, logger)
  return createStatusManager({
    store: createClusterOperatorStore(options.kubeConfig),
    inspector: createWorkloadInspector(options.kubeConfig),
    config,
    logger,
  })
}

export {
  createStatusManager,
  makeStatusManagerLayer,
  type StatusManager,
  type StatusManagerDeps,
  type StatusManagerHealth,
  StatusManagerService,
} from '~/server/status-manager'
export type {
  ClusterOperator,
  ClusterOperatorStatus,
  ClusterOperatorStore,
  ObjectReference,
  OperandVersion,
} from '~/server/status-manager/cluster-operator'
export { type Condition, type ConditionUpdate, OperatorCondition } from '~/server/status-manager/conditions'
export { StatusLevel } from '~/server/status-manager/degraded-levels'
export { resolveStatusManagerConfig, type StatusManagerConfig } from '~/server/status-manager/env-config'
export type { StatusLogger } from '~/server/status-manager/logger'
export { StatusPublisherStoppedError, type Status } from '~/server/status-manager/status-publisher'
export type {
  DaemonSetState,
  DeploymentState,
  WorkloadInspector,
  WorkloadRef,
} from '~/server/status-manager/workload-status'
export { createClusterOperatorStore, createWorkloadInspector } from '~/server/status-kube'
