import { formatError } from '~/server/object-utils'

import type { StatusLogger } from './logger'

export const DEFAULT_VERSION_ANNOTATION = 'release.openshift.io/version'

export type WorkloadRef = {
  namespace: string
  name: string
}

export type DaemonSetState = {
  generation: number
  observedGeneration: number
  desiredNumberScheduled: number
  updatedNumberScheduled: number
  numberUnavailable: number
  numberAvailable: number
  annotations: Record<string, string>
}

export type DeploymentState = {
  generation: number
  observedGeneration: number
  replicas: number
  updatedReplicas: number
  availableReplicas: number
  unavailableReplicas: number
  annotations: Record<string, string>
}

export type WorkloadInspector = {
  getDaemonSet: (ref: WorkloadRef) => Promise<DaemonSetState>
  getDeployment: (ref: WorkloadRef) => Promise<DeploymentState>
}

export type WorkloadEvaluation = {
  reachedAvailableLevel: boolean
  progressing: string[]
}

export const formatWorkloadRef = (ref: WorkloadRef) => (ref.namespace ? `${ref.namespace}/${ref.name}` : ref.name)

export const parseWorkloadRef = (value: string): WorkloadRef | null => {
  const trimmed = value.trim()
  if (!trimmed) return null
  const parts = trimmed.split('/')
  if (parts.length === 1) return { namespace: '', name: parts[0] }
  if (parts.length !== 2 || !parts[0] || !parts[1]) return null
  return { namespace: parts[0], name: parts[1] }
}

export const describeDaemonSetProgress = (ref: WorkloadRef, ds: DaemonSetState) => {
  const name = formatWorkloadRef(ref)
  if (ds.updatedNumberScheduled < ds.desiredNumberScheduled) {
    return `DaemonSet "${name}" update is rolling out (${ds.updatedNumberScheduled} out of ${ds.desiredNumberScheduled} updated)`
  }
  if (ds.numberUnavailable > 0) {
    return `DaemonSet "${name}" is not available (awaiting ${ds.numberUnavailable} nodes)`
  }
  // an empty (unscheduled) DaemonSet is never considered rolled out
  if (ds.numberAvailable === 0) {
    return `DaemonSet "${name}" is not yet scheduled on any nodes`
  }
  if (ds.generation > ds.observedGeneration) {
    return `DaemonSet "${name}" update is being processed (generation ${ds.generation}, observed generation ${ds.observedGeneration})`
  }
  return null
}

export const isDaemonSetAtLevel = (ds: DaemonSetState, targetVersion: string, versionAnnotation: string) =>
  ds.generation <= ds.observedGeneration &&
  ds.updatedNumberScheduled === ds.desiredNumberScheduled &&
  ds.numberUnavailable === 0 &&
  (ds.annotations[versionAnnotation] ?? '') === targetVersion

export const describeDeploymentProgress = (ref: WorkloadRef, dep: DeploymentState) => {
  const name = formatWorkloadRef(ref)
  if (dep.unavailableReplicas > 0) {
    return `Deployment "${name}" is not available (awaiting ${dep.unavailableReplicas} nodes)`
  }
  if (dep.availableReplicas === 0) {
    return `Deployment "${name}" is not yet scheduled on any nodes`
  }
  if (dep.observedGeneration < dep.generation) {
    return `Deployment "${name}" update is being processed (generation ${dep.generation}, observed generation ${dep.observedGeneration})`
  }
  return null
}

export const isDeploymentAtLevel = (dep: DeploymentState, targetVersion: string, versionAnnotation: string) =>
  dep.generation <= dep.observedGeneration &&
  dep.updatedReplicas === dep.replicas &&
  dep.availableReplicas > 0 &&
  (dep.annotations[versionAnnotation] ?? '') === targetVersion

type EvaluateWorkloadsInput = {
  inspector: WorkloadInspector
  daemonSets: readonly WorkloadRef[]
  deployments: readonly WorkloadRef[]
  targetVersion: string
  versionAnnotation?: string
  logger?: StatusLogger
}

/**
 * Inspects every tracked workload in order. A workload that cannot be fetched only adds a
 * "Waiting for" message: it neither clears nor excuses the running availability verdict.
 */
export const evaluateWorkloads = async (input: EvaluateWorkloadsInput): Promise<WorkloadEvaluation> => {
  const versionAnnotation = input.versionAnnotation ?? DEFAULT_VERSION_ANNOTATION
  const progressing: string[] = []
  let reachedAvailableLevel = input.daemonSets.length + input.deployments.length > 0

  for (const ref of input.daemonSets) {
    let ds: DaemonSetState
    try {
      ds = await input.inspector.getDaemonSet(ref)
    } catch (error) {
      input.logger?.warn(`Error getting DaemonSet "${formatWorkloadRef(ref)}"`, { error: formatError(error) })
      progressing.push(`Waiting for DaemonSet "${formatWorkloadRef(ref)}" to be created`)
      continue
    }

    const message = describeDaemonSetProgress(ref, ds)
    if (message) progressing.push(message)
    if (!isDaemonSetAtLevel(ds, input.targetVersion, versionAnnotation)) {
      reachedAvailableLevel = false
    }
  }

  for (const ref of input.deployments) {
    let dep: DeploymentState
    try {
      dep = await input.inspector.getDeployment(ref)
    } catch (error) {
      input.logger?.warn(`Error getting Deployment "${formatWorkloadRef(ref)}"`, { error: formatError(error) })
      progressing.push(`Waiting for Deployment "${formatWorkloadRef(ref)}" to be created`)
      continue
    }

    const message = describeDeploymentProgress(ref, dep)
    if (message) progressing.push(message)
    if (!isDeploymentAtLevel(dep, input.targetVersion, versionAnnotation)) {
      reachedAvailableLevel = false
    }
  }

  return { reachedAvailableLevel, progressing }
}
