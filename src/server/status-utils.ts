import type { ClusterOperatorStatus } from '~/server/status-manager/cluster-operator'

const compareText = (left: string | undefined, right: string | undefined) => (left ?? '').localeCompare(right ?? '')

const stableStringify = (value: unknown): string => {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value)
  }
  if (Array.isArray(value)) {
    return `[${value.map((entry) => stableStringify(entry)).join(',')}]`
  }
  const record = Object.fromEntries(Object.entries(value))
  const keys = Object.keys(record)
    .filter((key) => record[key] !== undefined)
    .sort()
  return `{${keys.map((key) => `${JSON.stringify(key)}:${stableStringify(record[key])}`).join(',')}}`
}

// Conditions are keyed by type and transition timestamps only move with status, so neither order nor
// lastTransitionTime takes part in the comparison.
export const normalizeStatusForCompare = (status: ClusterOperatorStatus) => ({
  conditions: status.conditions
    .map((condition) => ({
      type: condition.type,
      status: condition.status,
      reason: condition.reason || undefined,
      message: condition.message || undefined,
    }))
    .sort((a, b) => compareText(a.type, b.type)),
  versions: [...status.versions].sort(
    (a, b) => compareText(a.name, b.name) || compareText(a.version, b.version),
  ),
  relatedObjects: status.relatedObjects
    .map((ref) => ({ ...ref, namespace: ref.namespace || undefined }))
    .sort(
      (a, b) =>
        compareText(a.group, b.group) ||
        compareText(a.resource, b.resource) ||
        compareText(a.namespace, b.namespace) ||
        compareText(a.name, b.name),
    ),
})

export const isStatusEqual = (left: ClusterOperatorStatus, right: ClusterOperatorStatus) =>
  stableStringify(normalizeStatusForCompare(left)) === stableStringify(normalizeStatusForCompare(right))

export const shouldApplyStatus = (currentStatus: ClusterOperatorStatus, nextStatus: ClusterOperatorStatus) =>
  !isStatusEqual(currentStatus, nextStatus)
