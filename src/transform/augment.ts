/**
 * Match-then-append over one decoded request. Every scope is scanned before
 * anything is appended, so synthetic metrics never feed back into matching.
 */

import type { ExportMetricsServiceRequest } from '../types/otlp.ts';
import { findFunctionMatches, type MatchRule, type ScopeMatch } from './matchFunctions.ts';
import { buildSummaryMetric, type CustomAttribute } from './summaryMetric.ts';

export interface AugmentationRule extends MatchRule {
  attributes: readonly CustomAttribute[];
}

/** Appends one summary metric per matched function per scope; returns the matches. */
export function augmentRequest(
  request: ExportMetricsServiceRequest,
  rule: AugmentationRule,
  nowMs: number
): ScopeMatch[] {
  const matches = findFunctionMatches(request, rule);
  for (const { scope, functionNames } of matches) {
    for (const functionName of functionNames) {
      scope.metrics.push(
        buildSummaryMetric(functionName, {
          functionLabelKey: rule.functionLabelKey,
          attributes: rule.attributes,
          nowMs,
        })
      );
    }
  }
  return matches;
}
