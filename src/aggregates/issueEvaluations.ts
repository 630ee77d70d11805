import type { EvaluationRecord, IssueRecord } from '../collections/schemas'
import { NotFoundError } from '../errors'
import type { IssueEvaluationSummary } from './types'

/**
 * Perspective breakdown of one issue's evaluations. An unknown issue id is a
 * NotFoundError; a known issue nobody evaluated yields all-zero counts.
 */
export function summarizeIssueEvaluations(
  issueId: string,
  issues: readonly IssueRecord[],
  evaluations: readonly EvaluationRecord[]
): IssueEvaluationSummary {
  const issue = issues.find((i) => i.id === issueId)
  if (!issue) throw new NotFoundError('issue', issueId)

  const summary: IssueEvaluationSummary = {
    issueId,
    issueTitle: issue.title,
    leftCount: 0,
    centerCount: 0,
    rightCount: 0,
    totalCount: 0
  }
  for (const evaluation of evaluations) {
    if (evaluation.issueId !== issueId) continue
    if (evaluation.perspective === 'left') summary.leftCount++
    else if (evaluation.perspective === 'center') summary.centerCount++
    else summary.rightCount++
  }
  summary.totalCount = summary.leftCount + summary.centerCount + summary.rightCount
  return summary
}
