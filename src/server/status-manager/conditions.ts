import { asRecord, asString } from '~/server/object-utils'

export const OperatorCondition = {
  Available: 'Available',
  Progressing: 'Progressing',
  Degraded: 'Degraded',
  Upgradeable: 'Upgradeable',
} as const

export type OperatorConditionType = (typeof OperatorCondition)[keyof typeof OperatorCondition]

export type ConditionStatus = 'True' | 'False' | 'Unknown'

export type Condition = {
  type: string
  status: ConditionStatus
  reason?: string
  message?: string
  lastTransitionTime: string
}

export type ConditionUpdate = {
  type: OperatorConditionType
  status: ConditionStatus
  reason?: string
  message?: string
}

const defaultNowIso = () => new Date().toISOString()

export const normalizeConditionStatus = (status?: string | null): ConditionStatus =>
  status === 'True' ? 'True' : status === 'False' ? 'False' : 'Unknown'

// reason and message are compared verbatim against what gets published, so they are not trimmed
const optionalText = (value: unknown) => (typeof value === 'string' && value.length > 0 ? value : undefined)

const withOptionalText = <T extends { reason?: string; message?: string }>(value: T): T => {
  const next = { ...value }
  if (!next.reason) delete next.reason
  if (!next.message) delete next.message
  return next
}

export const normalizeConditions = (raw: unknown, nowIso: () => string = defaultNowIso): Condition[] => {
  if (!Array.isArray(raw)) return []
  const output: Condition[] = []
  for (const item of raw) {
    const record = asRecord(item)
    if (!record) continue
    const type = asString(record.type)
    const status = asString(record.status)
    if (!type || !status) continue
    if (output.some((existing) => existing.type === type)) continue
    output.push(
      withOptionalText({
        type,
        status: normalizeConditionStatus(status),
        reason: optionalText(record.reason),
        message: optionalText(record.message),
        lastTransitionTime: asString(record.lastTransitionTime) ?? nowIso(),
      }),
    )
  }
  return output
}

export const findCondition = (conditions: Condition[], type: string) =>
  conditions.find((condition) => condition.type === type)

/**
 * Merges a condition into the set by type. Reason and message always take the update's values;
 * `lastTransitionTime` only moves when the status flips.
 */
export const upsertCondition = (
  conditions: Condition[],
  update: ConditionUpdate,
  nowIso: () => string = defaultNowIso,
): Condition[] => {
  const next = [...conditions]
  const index = next.findIndex((cond) => cond.type === update.type)
  if (index === -1) {
    next.push(withOptionalText({ ...update, lastTransitionTime: nowIso() }))
    return next
  }
  const existing = next[index]
  next[index] = withOptionalText({
    ...update,
    lastTransitionTime: existing.status === update.status ? existing.lastTransitionTime : nowIso(),
  })
  return next
}
