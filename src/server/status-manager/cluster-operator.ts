import { asRecord, asString, readNested } from '~/server/object-utils'

import { type Condition, normalizeConditions } from './conditions'

export const CLUSTER_OPERATOR_GROUP = 'config.openshift.io'
export const CLUSTER_OPERATOR_VERSION = 'v1'
export const CLUSTER_OPERATOR_PLURAL = 'clusteroperators'

export type ObjectReference = {
  group: string
  resource: string
  namespace?: string
  name: string
}

export type OperandVersion = {
  name: string
  version: string
}

export type ClusterOperatorStatus = {
  conditions: Condition[]
  versions: OperandVersion[]
  relatedObjects: ObjectReference[]
}

export type ClusterOperator = {
  apiVersion: string
  kind: 'ClusterOperator'
  metadata: {
    name: string
    resourceVersion?: string
  }
  status: ClusterOperatorStatus
}

/** Backing store for the ClusterOperator resource. `get` resolves `null` when the resource does not exist. */
export type ClusterOperatorStore = {
  get: (name: string) => Promise<ClusterOperator | null>
  create: (resource: ClusterOperator) => Promise<void>
  updateStatus: (resource: ClusterOperator) => Promise<void>
}

export const emptyClusterOperatorStatus = (): ClusterOperatorStatus => ({
  conditions: [],
  versions: [],
  relatedObjects: [],
})

export const buildClusterOperator = (name: string): ClusterOperator => ({
  apiVersion: `${CLUSTER_OPERATOR_GROUP}/${CLUSTER_OPERATOR_VERSION}`,
  kind: 'ClusterOperator',
  metadata: { name },
  status: emptyClusterOperatorStatus(),
})

export const cloneClusterOperatorStatus = (status: ClusterOperatorStatus): ClusterOperatorStatus => ({
  conditions: status.conditions.map((condition) => ({ ...condition })),
  versions: status.versions.map((version) => ({ ...version })),
  relatedObjects: status.relatedObjects.map((ref) => ({ ...ref })),
})

const normalizeVersions = (raw: unknown): OperandVersion[] => {
  if (!Array.isArray(raw)) return []
  const output: OperandVersion[] = []
  for (const item of raw) {
    const record = asRecord(item)
    const name = asString(record?.name)
    const version = asString(record?.version)
    if (!name || !version) continue
    output.push({ name, version })
  }
  return output
}

// Store reads and caller-supplied references go through the same trimming so they compare equal.
export const normalizeObjectReference = (ref: ObjectReference): ObjectReference => {
  const namespace = ref.namespace?.trim()
  return {
    // core group is the empty string
    group: ref.group.trim(),
    resource: ref.resource.trim(),
    ...(namespace ? { namespace } : {}),
    name: ref.name.trim(),
  }
}

const normalizeRelatedObjects = (raw: unknown): ObjectReference[] => {
  if (!Array.isArray(raw)) return []
  const output: ObjectReference[] = []
  for (const item of raw) {
    const record = asRecord(item)
    if (!record) continue
    const resource = asString(record.resource)
    const name = asString(record.name)
    if (!resource || !name) continue
    output.push(
      normalizeObjectReference({
        group: typeof record.group === 'string' ? record.group : '',
        resource,
        namespace: asString(record.namespace) ?? undefined,
        name,
      }),
    )
  }
  return output
}

export const parseClusterOperator = (raw: unknown, fallbackName: string): ClusterOperator => {
  const status = asRecord(readNested(raw, ['status']))
  const resourceVersion = asString(readNested(raw, ['metadata', 'resourceVersion']))
  return {
    apiVersion: asString(readNested(raw, ['apiVersion'])) ?? `${CLUSTER_OPERATOR_GROUP}/${CLUSTER_OPERATOR_VERSION}`,
    kind: 'ClusterOperator',
    metadata: {
      name: asString(readNested(raw, ['metadata', 'name'])) ?? fallbackName,
      ...(resourceVersion ? { resourceVersion } : {}),
    },
    status: {
      conditions: normalizeConditions(status?.conditions),
      versions: normalizeVersions(status?.versions),
      relatedObjects: normalizeRelatedObjects(status?.relatedObjects),
    },
  }
}
