import { asRecord } from '~/server/object-utils'

import { createConsoleLogger, type StatusLogger } from './logger'
import { DEFAULT_STATUS_QUEUE_CAPACITY } from './status-publisher'
import { DEFAULT_VERSION_ANNOTATION, parseWorkloadRef, type WorkloadRef } from './workload-status'

type Env = Record<string, string | undefined>

export type StatusManagerConfig = {
  name: string
  component: string
  releaseVersion: string
  versionAnnotation: string
  queueCapacity: number
  daemonSets: WorkloadRef[]
  deployments: WorkloadRef[]
}

const DEFAULT_NAME = 'network'

export const parseNumberEnv = (value: string | undefined, fallback: number, min = 0) => {
  if (!value) return fallback
  const parsed = Number.parseInt(value, 10)
  if (!Number.isFinite(parsed) || parsed < min) return fallback
  return parsed
}

export const parseJsonEnv = (env: Env, name: string, logger: StatusLogger) => {
  const raw = env[name]
  if (!raw) return null
  try {
    return JSON.parse(raw) as unknown
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    logger.warn(`invalid ${name} JSON: ${message}`)
    return null
  }
}

const parseWorkloadRefs = (value: unknown) =>
  Array.isArray(value)
    ? value
        .filter((item): item is string => typeof item === 'string')
        .map(parseWorkloadRef)
        .filter((ref): ref is WorkloadRef => ref !== null)
    : []

const readText = (env: Env, name: string, fallback: string) => {
  const trimmed = env[name]?.trim()
  return trimmed ? trimmed : fallback
}

export const resolveStatusManagerConfig = (
  env: Env = process.env,
  logger: StatusLogger = createConsoleLogger(),
): StatusManagerConfig => {
  const workloads = asRecord(parseJsonEnv(env, 'OPERATOR_STATUS_WORKLOADS', logger))
  const name = readText(env, 'OPERATOR_STATUS_NAME', DEFAULT_NAME)
  return {
    name,
    component: readText(env, 'OPERATOR_STATUS_COMPONENT', name),
    releaseVersion: env.RELEASE_VERSION?.trim() ?? '',
    versionAnnotation: readText(env, 'OPERATOR_STATUS_VERSION_ANNOTATION', DEFAULT_VERSION_ANNOTATION),
    queueCapacity: parseNumberEnv(env.OPERATOR_STATUS_QUEUE_CAPACITY, DEFAULT_STATUS_QUEUE_CAPACITY, 1),
    daemonSets: parseWorkloadRefs(workloads?.daemonSets),
    deployments: parseWorkloadRefs(workloads?.deployments),
  }
}
