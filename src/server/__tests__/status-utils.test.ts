import { describe, expect, it } from 'vitest'

import { isStatusEqual, shouldApplyStatus } from '~/server/status-utils'

describe('status utils', () => {
  it('ignores ordering of conditions, versions and related objects', () => {
    const current = {
      conditions: [
        { type: 'Available', status: 'True' as const, lastTransitionTime: '2026-01-01T00:00:00.000Z' },
        { type: 'Degraded', status: 'False' as const, lastTransitionTime: '2026-01-01T00:00:00.000Z' },
      ],
      versions: [
        { name: 'operator', version: '4.16.0' },
        { name: 'ovn', version: '4.16.0' },
      ],
      relatedObjects: [
        { group: '', resource: 'namespaces', name: 'openshift-sdn' },
        { group: 'operator.openshift.io', resource: 'networks', name: 'cluster' },
      ],
    }
    const next = {
      conditions: [...current.conditions].reverse(),
      versions: [...current.versions].reverse(),
      relatedObjects: [...current.relatedObjects].reverse(),
    }

    expect(isStatusEqual(current, next)).toBe(true)
    expect(shouldApplyStatus(current, next)).toBe(false)
  })

  it('treats empty reason, message and namespace as absent', () => {
    const current = {
      conditions: [
        { type: 'Upgradeable', status: 'True' as const, reason: '', lastTransitionTime: '2026-01-01T00:00:00.000Z' },
      ],
      versions: [],
      relatedObjects: [{ group: '', resource: 'namespaces', namespace: '', name: 'openshift-sdn' }],
    }
    const next = {
      conditions: [{ type: 'Upgradeable', status: 'True' as const, lastTransitionTime: '2026-01-01T00:00:00.000Z' }],
      versions: [],
      relatedObjects: [{ group: '', resource: 'namespaces', name: 'openshift-sdn' }],
    }

    expect(isStatusEqual(current, next)).toBe(true)
  })

  it('detects changed condition fields', () => {
    const current = {
      conditions: [{ type: 'Degraded', status: 'False' as const, lastTransitionTime: '2026-01-01T00:00:00.000Z' }],
      versions: [],
      relatedObjects: [],
    }
    const next = {
      ...current,
      conditions: [
        {
          type: 'Degraded',
          status: 'True' as const,
          reason: 'Broken',
          lastTransitionTime: '2026-01-02T00:00:00.000Z',
        },
      ],
    }

    expect(shouldApplyStatus(current, next)).toBe(true)
  })

  it('detects a dropped version entry', () => {
    const current = { conditions: [], versions: [{ name: 'operator', version: '4.16.0' }], relatedObjects: [] }

    expect(shouldApplyStatus(current, { ...current, versions: [] })).toBe(true)
  })
})
