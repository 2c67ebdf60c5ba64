import { type ConditionUpdate, OperatorCondition } from './conditions'

// Lower value wins when several levels are degraded at once.
export const StatusLevel = {
  ClusterConfig: 0,
  OperatorConfig: 1,
  PodDeployment: 2,
} as const

export type StatusLevel = (typeof StatusLevel)[keyof typeof StatusLevel]

export const STATUS_LEVELS: readonly StatusLevel[] = [
  StatusLevel.ClusterConfig,
  StatusLevel.OperatorConfig,
  StatusLevel.PodDeployment,
]

const STATUS_LEVEL_NAMES: Record<StatusLevel, string> = {
  [StatusLevel.ClusterConfig]: 'ClusterConfig',
  [StatusLevel.OperatorConfig]: 'OperatorConfig',
  [StatusLevel.PodDeployment]: 'PodDeployment',
}

export const describeStatusLevel = (level: StatusLevel) => STATUS_LEVEL_NAMES[level]

export type DegradedCondition = ConditionUpdate & { type: typeof OperatorCondition.Degraded }

export const buildDegradedCondition = (reason: string, message: string): DegradedCondition => ({
  type: OperatorCondition.Degraded,
  status: 'True',
  reason,
  message,
})

const NOT_DEGRADED: DegradedCondition = {
  type: OperatorCondition.Degraded,
  status: 'False',
}

export type DegradedLevelTracker = {
  setLevel: (level: StatusLevel, condition: DegradedCondition | null) => void
  resolve: () => DegradedCondition
  activeLevel: () => StatusLevel | null
}

export const createDegradedLevelTracker = (): DegradedLevelTracker => {
  const slots = new Map<StatusLevel, DegradedCondition>()

  const activeLevel = () => STATUS_LEVELS.find((level) => slots.has(level)) ?? null

  return {
    setLevel: (level, condition) => {
      if (condition) {
        slots.set(level, { ...condition })
      } else {
        slots.delete(level)
      }
    },
    resolve: () => {
      const level = activeLevel()
      const condition = level === null ? undefined : slots.get(level)
      return { ...(condition ?? NOT_DEGRADED) }
    },
    activeLevel,
  }
}
