import { describe, expect, it } from 'vitest'

import {
  describeDaemonSetProgress,
  describeDeploymentProgress,
  evaluateWorkloads,
  formatWorkloadRef,
  parseWorkloadRef,
} from '~/server/status-manager/workload-status'
import {
  createFakeWorkloadInspector,
  createRecordingLogger,
  readyDaemonSet,
  readyDeployment,
} from '~/test-utils/fake-cluster'

const sdn = { namespace: 'openshift-sdn', name: 'sdn' }
const ovs = { namespace: 'openshift-sdn', name: 'ovs' }
const controller = { namespace: 'openshift-sdn', name: 'sdn-controller' }

describe('workload status evaluation', () => {
  it('has not reached the available level without tracked workloads', async () => {
    const result = await evaluateWorkloads({
      inspector: createFakeWorkloadInspector({}),
      daemonSets: [],
      deployments: [],
      targetVersion: '4.16.0',
    })

    expect(result).toEqual({ reachedAvailableLevel: false, progressing: [] })
  })

  it('reaches the available level when a single workload matches', async () => {
    const result = await evaluateWorkloads({
      inspector: createFakeWorkloadInspector({ daemonSets: { 'openshift-sdn/sdn': readyDaemonSet() } }),
      daemonSets: [sdn],
      deployments: [],
      targetVersion: '4.16.0',
    })

    expect(result).toEqual({ reachedAvailableLevel: true, progressing: [] })
  })

  it('reports the first matching daemon set progress reason only', () => {
    expect(describeDaemonSetProgress(sdn, readyDaemonSet({ updatedNumberScheduled: 1, numberUnavailable: 2 }))).toBe(
      'DaemonSet "openshift-sdn/sdn" update is rolling out (1 out of 3 updated)',
    )
    expect(describeDaemonSetProgress(sdn, readyDaemonSet({ numberUnavailable: 2, numberAvailable: 0 }))).toBe(
      'DaemonSet "openshift-sdn/sdn" is not available (awaiting 2 nodes)',
    )
    expect(describeDaemonSetProgress(sdn, readyDaemonSet({ numberAvailable: 0, generation: 4 }))).toBe(
      'DaemonSet "openshift-sdn/sdn" is not yet scheduled on any nodes',
    )
    expect(describeDaemonSetProgress(sdn, readyDaemonSet({ generation: 4, observedGeneration: 3 }))).toBe(
      'DaemonSet "openshift-sdn/sdn" update is being processed (generation 4, observed generation 3)',
    )
    expect(describeDaemonSetProgress(sdn, readyDaemonSet())).toBeNull()
  })

  it('reports deployment progress reasons in precedence order', () => {
    expect(describeDeploymentProgress(controller, readyDeployment({ unavailableReplicas: 1, availableReplicas: 0 }))).toBe(
      'Deployment "openshift-sdn/sdn-controller" is not available (awaiting 1 nodes)',
    )
    expect(describeDeploymentProgress(controller, readyDeployment({ availableReplicas: 0 }))).toBe(
      'Deployment "openshift-sdn/sdn-controller" is not yet scheduled on any nodes',
    )
    expect(describeDeploymentProgress(controller, readyDeployment({ generation: 3 }))).toBe(
      'Deployment "openshift-sdn/sdn-controller" update is being processed (generation 3, observed generation 2)',
    )
    expect(describeDeploymentProgress(controller, readyDeployment())).toBeNull()
  })

  it('does not reach the available level on a version mismatch even without messages', async () => {
    const result = await evaluateWorkloads({
      inspector: createFakeWorkloadInspector({
        deployments: {
          'openshift-sdn/sdn-controller': readyDeployment({ annotations: { 'release.openshift.io/version': '4.15.2' } }),
        },
      }),
      daemonSets: [],
      deployments: [controller],
      targetVersion: '4.16.0',
    })

    expect(result).toEqual({ reachedAvailableLevel: false, progressing: [] })
  })

  it('reads the version from a custom annotation', async () => {
    const result = await evaluateWorkloads({
      inspector: createFakeWorkloadInspector({
        daemonSets: { 'openshift-sdn/sdn': readyDaemonSet({ annotations: { 'example.com/version': '1.2.3' } }) },
      }),
      daemonSets: [sdn],
      deployments: [],
      targetVersion: '1.2.3',
      versionAnnotation: 'example.com/version',
    })

    expect(result.reachedAvailableLevel).toBe(true)
  })

  it('inspects every workload and keeps messages in iteration order', async () => {
    const inspector = createFakeWorkloadInspector({
      daemonSets: {
        'openshift-sdn/sdn': readyDaemonSet({ numberUnavailable: 1 }),
        'openshift-sdn/ovs': readyDaemonSet({ updatedNumberScheduled: 2 }),
      },
      deployments: { 'openshift-sdn/sdn-controller': readyDeployment({ availableReplicas: 0 }) },
    })

    const result = await evaluateWorkloads({
      inspector,
      daemonSets: [sdn, ovs],
      deployments: [controller],
      targetVersion: '4.16.0',
    })

    expect(result).toEqual({
      reachedAvailableLevel: false,
      progressing: [
        'DaemonSet "openshift-sdn/sdn" is not available (awaiting 1 nodes)',
        'DaemonSet "openshift-sdn/ovs" update is rolling out (2 out of 3 updated)',
        'Deployment "openshift-sdn/sdn-controller" is not yet scheduled on any nodes',
      ],
    })
    expect(inspector.getDaemonSet).toHaveBeenCalledTimes(2)
    expect(inspector.getDeployment).toHaveBeenCalledTimes(1)
  })

  it('treats a fetch failure as progressing without changing the availability fold', async () => {
    const logger = createRecordingLogger()
    const result = await evaluateWorkloads({
      inspector: createFakeWorkloadInspector({ deployments: { 'openshift-sdn/sdn-controller': readyDeployment() } }),
      daemonSets: [sdn],
      deployments: [controller],
      targetVersion: '4.16.0',
      logger,
    })

    expect(result).toEqual({
      reachedAvailableLevel: true,
      progressing: ['Waiting for DaemonSet "openshift-sdn/sdn" to be created'],
    })
    expect(logger.warn).toHaveBeenCalledWith('Error getting DaemonSet "openshift-sdn/sdn"', {
      error: 'daemonsets.apps "sdn" not found',
    })
  })

  it('still folds to false when a later workload is behind a failed fetch', async () => {
    const result = await evaluateWorkloads({
      inspector: createFakeWorkloadInspector({
        deployments: { 'openshift-sdn/sdn-controller': readyDeployment({ updatedReplicas: 1 }) },
      }),
      daemonSets: [sdn],
      deployments: [controller],
      targetVersion: '4.16.0',
    })

    expect(result).toEqual({
      reachedAvailableLevel: false,
      progressing: ['Waiting for DaemonSet "openshift-sdn/sdn" to be created'],
    })
  })

  it('formats and parses workload references', () => {
    expect(formatWorkloadRef(sdn)).toBe('openshift-sdn/sdn')
    expect(formatWorkloadRef({ namespace: '', name: 'cluster-wide' })).toBe('cluster-wide')
    expect(parseWorkloadRef(' openshift-sdn/sdn ')).toEqual(sdn)
    expect(parseWorkloadRef('cluster-wide')).toEqual({ namespace: '', name: 'cluster-wide' })
    expect(parseWorkloadRef('a/b/c')).toBeNull()
    expect(parseWorkloadRef('/name')).toBeNull()
  })
})
