import type { StageCondition, StageStatus } from '../contracts/stage.js'

const FAILED_STATUSES: ReadonlySet<StageStatus> = new Set<StageStatus>([
  'failed_ignored',
  'failed_required',
  'timed_out',
])

/**
 * Outcome of a condition check.
 */
export interface ConditionEvaluation {
  /** True when the stage should run. */
  readonly holds: boolean
  /** Explanation used as skip reason when the condition does not hold. */
  readonly reason?: string
}

/**
 * Evaluates a stage condition against recorded stage statuses.
 *
 * @param condition Stage condition, undefined meaning always.
 * @param statusOf Status lookup for referenced stages.
 * @returns Evaluation result.
 */
export const evaluateStageCondition = (
  condition: StageCondition | undefined,
  statusOf: (stageName: string) => StageStatus | undefined
): ConditionEvaluation => {
  if (!condition || condition.kind === 'always') {
    return { holds: true }
  }

  if (condition.kind === 'all_succeeded') {
    const notSucceeded = condition.stages.filter((name) => statusOf(name) !== 'succeeded')
    if (notSucceeded.length === 0) {
      return { holds: true }
    }

    return {
      holds: false,
      reason: `runIfAllSucceeded not met (${notSucceeded.join(', ')} did not succeed)`,
    }
  }

  const failed = condition.stages.filter((name) => {
    const status = statusOf(name)
    return status !== undefined && FAILED_STATUSES.has(status)
  })
  if (failed.length > 0) {
    return { holds: true }
  }

  return {
    holds: false,
    reason: `runIfAnyFailed not met (none of ${condition.stages.join(', ')} failed)`,
  }
}
