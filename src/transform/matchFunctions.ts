/**
 * Finds which target functions appear in each instrumentation scope of a request.
 *
 * A function counts once per scope: the first labelled data point wins and
 * later sightings in the same scope (any metric, any data point) are skipped.
 * Scopes are independent, so the same function can match in several of them.
 */

import {
  metricDataPoints,
  type ExportMetricsServiceRequest,
  type InstrumentationLibraryMetrics,
} from '../types/otlp.ts';

export interface MatchRule {
  targetFunctions: ReadonlySet<string>;
  /** Label key whose value names the function, e.g. "FunctionName". */
  functionLabelKey: string;
}

export interface ScopeMatch {
  scope: InstrumentationLibraryMetrics;
  /** Matched function names in first-seen order. */
  functionNames: string[];
}

function matchScope(scope: InstrumentationLibraryMetrics, rule: MatchRule): string[] {
  const produced = new Set<string>();
  // Bound to the pre-scan length so anything appended later is never re-read.
  const metricCount = scope.metrics.length;
  for (let i = 0; i < metricCount; i++) {
    const metric = scope.metrics[i];
    if (!metric) continue;
    for (const dp of metricDataPoints(metric)) {
      for (const label of dp.labels) {
        if (label.key !== rule.functionLabelKey || label.value === undefined) continue;
        if (!rule.targetFunctions.has(label.value) || produced.has(label.value)) continue;
        produced.add(label.value);
      }
    }
  }
  return [...produced];
}

export function findFunctionMatches(
  request: ExportMetricsServiceRequest,
  rule: MatchRule
): ScopeMatch[] {
  const matches: ScopeMatch[] = [];
  for (const rm of request.resourceMetrics) {
    for (const scope of rm.instrumentationLibraryMetrics) {
      const functionNames = matchScope(scope, rule);
      if (functionNames.length > 0) {
        matches.push({ scope, functionNames });
      }
    }
  }
  return matches;
}
