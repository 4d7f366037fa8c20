import { describe, it, expect } from 'vitest';
import { findFunctionMatches, type MatchRule } from '../transform/matchFunctions.ts';
import { metricDataPoints, type Metric } from '../types/otlp.ts';
import { gaugeMetric, lambdaMetric, requestWithScopes } from './fixtures.ts';

const rule: MatchRule = {
  targetFunctions: new Set(['f1', 'f2']),
  functionLabelKey: 'FunctionName',
};

function names(request: ReturnType<typeof requestWithScopes>): string[][] {
  return findFunctionMatches(request, rule).map((m) => m.functionNames);
}

describe('findFunctionMatches', () => {
  it('matches a target function labelled on a gauge data point', () => {
    const request = requestWithScopes([gaugeMetric('g', { FunctionName: 'f1' })]);
    const matches = findFunctionMatches(request, rule);
    expect(matches).toHaveLength(1);
    expect(matches[0]?.functionNames).toEqual(['f1']);
    expect(matches[0]?.scope).toBe(request.resourceMetrics[0]?.instrumentationLibraryMetrics[0]);
  });

  it('ignores functions outside the target set', () => {
    expect(names(requestWithScopes([lambdaMetric('Invocations', 'other')]))).toEqual([]);
  });

  it('ignores the target value under a different label key', () => {
    expect(names(requestWithScopes([gaugeMetric('g', { Function: 'f1', Resource: 'f2' })]))).toEqual([]);
  });

  it('reports a function once per scope however many data points carry it', () => {
    const request = requestWithScopes([
      lambdaMetric('Invocations', 'f1'),
      lambdaMetric('Errors', 'f1'),
      lambdaMetric('Duration', 'f1'),
    ]);
    expect(names(request)).toEqual([['f1']]);
  });

  it('keeps first-seen order across metrics', () => {
    const request = requestWithScopes([
      lambdaMetric('Invocations', 'f2'),
      lambdaMetric('Invocations', 'other'),
      lambdaMetric('Invocations', 'f1'),
      lambdaMetric('Errors', 'f2'),
    ]);
    expect(names(request)).toEqual([['f2', 'f1']]);
  });

  it('deduplicates per scope, not per request', () => {
    const request = requestWithScopes(
      [lambdaMetric('Invocations', 'f1')],
      [lambdaMetric('Invocations', 'other')],
      [lambdaMetric('Errors', 'f1'), lambdaMetric('Errors', 'f2')]
    );
    expect(names(request)).toEqual([['f1'], ['f1', 'f2']]);
  });

  it('examines every label of a data point', () => {
    const metric: Metric = {
      name: 'multi',
      data: 'intSum',
      intSum: {
        dataPoints: [
          {
            labels: [
              { key: 'FunctionName', value: 'f2' },
              { key: 'FunctionName', value: 'f1' },
              { key: 'FunctionName', value: 'f2' },
            ],
          },
        ],
      },
    };
    expect(names(requestWithScopes([metric]))).toEqual([['f2', 'f1']]);
  });

  it('walks every metric variant', () => {
    const variants: Metric[] = [
      { data: 'intGauge', intGauge: { dataPoints: [{ labels: [{ key: 'FunctionName', value: 'a' }] }] } },
      { data: 'doubleGauge', doubleGauge: { dataPoints: [{ labels: [{ key: 'FunctionName', value: 'b' }] }] } },
      { data: 'intSum', intSum: { dataPoints: [{ labels: [{ key: 'FunctionName', value: 'c' }] }] } },
      { data: 'doubleSum', doubleSum: { dataPoints: [{ labels: [{ key: 'FunctionName', value: 'd' }] }] } },
      { data: 'intHistogram', intHistogram: { dataPoints: [{ labels: [{ key: 'FunctionName', value: 'e' }] }] } },
      {
        data: 'doubleHistogram',
        doubleHistogram: { dataPoints: [{ labels: [{ key: 'FunctionName', value: 'f' }] }] },
      },
      { data: 'doubleSummary', doubleSummary: { dataPoints: [{ labels: [{ key: 'FunctionName', value: 'g' }] }] } },
    ];
    const allTargets: MatchRule = {
      targetFunctions: new Set(['a', 'b', 'c', 'd', 'e', 'f', 'g']),
      functionLabelKey: 'FunctionName',
    };
    const matches = findFunctionMatches(requestWithScopes(variants), allTargets);
    expect(matches[0]?.functionNames).toEqual(['a', 'b', 'c', 'd', 'e', 'f', 'g']);
  });

  it('skips metrics with no populated variant', () => {
    expect(names(requestWithScopes([{ name: 'no-data' }, gaugeMetric('g', { FunctionName: 'f2' })]))).toEqual([
      ['f2'],
    ]);
  });

  it('skips labels with no value', () => {
    const metric: Metric = {
      data: 'doubleGauge',
      doubleGauge: { dataPoints: [{ labels: [{ key: 'FunctionName' }] }] },
    };
    expect(names(requestWithScopes([metric]))).toEqual([]);
  });

  it('returns nothing for a request without resources', () => {
    expect(findFunctionMatches({ resourceMetrics: [] }, rule)).toEqual([]);
  });

  it('does not modify the request', () => {
    const request = requestWithScopes([lambdaMetric('Invocations', 'f1')]);
    const before = structuredClone(request);
    findFunctionMatches(request, rule);
    expect(request).toEqual(before);
  });
});

describe('metricDataPoints', () => {
  it('returns the data points of the populated variant', () => {
    const metric = gaugeMetric('g', { host: 'a' });
    expect(metricDataPoints(metric)).toHaveLength(1);
    expect(metricDataPoints(metric)[0]?.labels).toEqual([{ key: 'host', value: 'a' }]);
  });

  it('returns an empty list when no variant is populated', () => {
    expect(metricDataPoints({ name: 'bare' })).toEqual([]);
  });
});
