import { AppsV1Api, CustomObjectsApi, KubeConfig, type V1DaemonSet, type V1Deployment } from '@kubernetes/client-node'

import {
  CLUSTER_OPERATOR_GROUP,
  CLUSTER_OPERATOR_PLURAL,
  CLUSTER_OPERATOR_VERSION,
  type ClusterOperatorStore,
  parseClusterOperator,
} from '~/server/status-manager/cluster-operator'
import type { DaemonSetState, DeploymentState, WorkloadInspector } from '~/server/status-manager/workload-status'

const loadKubeConfig = (kubeConfig?: KubeConfig) => {
  if (kubeConfig) return kubeConfig
  const config = new KubeConfig()
  config.loadFromDefault()
  return config
}

export const getKubeStatusCode = (error: unknown): number | null => {
  if (!error || typeof error !== 'object') return null
  if ('code' in error && typeof error.code === 'number') return error.code
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode
  if ('response' in error && error.response && typeof error.response === 'object') {
    const response = error.response
    if ('statusCode' in response && typeof response.statusCode === 'number') return response.statusCode
  }
  return null
}

export const formatKubeError = (error: unknown) => {
  const message = error instanceof Error ? error.message : String(error)
  const status = getKubeStatusCode(error)
  return status ? `${message} (status=${status})` : message
}

const clusterOperatorPath = {
  group: CLUSTER_OPERATOR_GROUP,
  version: CLUSTER_OPERATOR_VERSION,
  plural: CLUSTER_OPERATOR_PLURAL,
}

export const createClusterOperatorStore = (kubeConfig?: KubeConfig): ClusterOperatorStore => {
  const api = loadKubeConfig(kubeConfig).makeApiClient(CustomObjectsApi)
  return {
    get: async (name) => {
      try {
        const raw: unknown = await api.getClusterCustomObject({ ...clusterOperatorPath, name })
        return parseClusterOperator(raw, name)
      } catch (error) {
        if (getKubeStatusCode(error) === 404) return null
        throw new Error(`get ClusterOperator ${name} failed: ${formatKubeError(error)}`)
      }
    },
    create: async (resource) => {
      try {
        await api.createClusterCustomObject({ ...clusterOperatorPath, body: resource })
      } catch (error) {
        throw new Error(`create ClusterOperator ${resource.metadata.name} failed: ${formatKubeError(error)}`)
      }
    },
    updateStatus: async (resource) => {
      try {
        await api.replaceClusterCustomObjectStatus({
          ...clusterOperatorPath,
          name: resource.metadata.name,
          body: resource,
        })
      } catch (error) {
        throw new Error(`update ClusterOperator ${resource.metadata.name} status failed: ${formatKubeError(error)}`)
      }
    },
  }
}

export const toDaemonSetState = (ds: V1DaemonSet): DaemonSetState => ({
  generation: ds.metadata?.generation ?? 0,
  observedGeneration: ds.status?.observedGeneration ?? 0,
  desiredNumberScheduled: ds.status?.desiredNumberScheduled ?? 0,
  updatedNumberScheduled: ds.status?.updatedNumberScheduled ?? 0,
  numberUnavailable: ds.status?.numberUnavailable ?? 0,
  numberAvailable: ds.status?.numberAvailable ?? 0,
  annotations: { ...(ds.metadata?.annotations ?? {}) },
})

export const toDeploymentState = (dep: V1Deployment): DeploymentState => ({
  generation: dep.metadata?.generation ?? 0,
  observedGeneration: dep.status?.observedGeneration ?? 0,
  replicas: dep.status?.replicas ?? 0,
  updatedReplicas: dep.status?.updatedReplicas ?? 0,
  availableReplicas: dep.status?.availableReplicas ?? 0,
  unavailableReplicas: dep.status?.unavailableReplicas ?? 0,
  annotations: { ...(dep.metadata?.annotations ?? {}) },
})

export const createWorkloadInspector = (kubeConfig?: KubeConfig): WorkloadInspector => {
  const api = loadKubeConfig(kubeConfig).makeApiClient(AppsV1Api)
  return {
    getDaemonSet: async (ref) => toDaemonSetState(await api.readNamespacedDaemonSet(ref)),
    getDeployment: async (ref) => toDeploymentState(await api.readNamespacedDeployment(ref)),
  }
}
