/**
 * Builds the synthetic DoubleSummary metric that carries custom attributes for
 * one function. It mirrors the shape of the AWS/Lambda metrics in the stream;
 * its numbers are fixed placeholders (count 1, sum 1, min = max = 1).
 */

export const SUMMARY_METRIC_NAME = 'amazonaws.com/AWS/Lambda/Custom';
export const SUMMARY_METRIC_UNIT = '{Count}';
export const SUMMARY_NAMESPACE = 'AWS/Lambda';
export const SUMMARY_METRIC_LABEL = 'Custom';

const NANOS_PER_SECOND = 1_000_000_000n;

export type CustomAttribute = readonly [key: string, value: string];

export type SummaryLabel = { key: string; value: string };

export type ValueAtQuantile = { quantile: number; value: number };

export type SummaryDataPoint = {
  labels: SummaryLabel[];
  startTimeUnixNano: string;
  timeUnixNano: string;
  count: string;
  sum: number;
  quantileValues: ValueAtQuantile[];
};

export type SummaryMetric = {
  name: string;
  unit: string;
  data: 'doubleSummary';
  doubleSummary: { dataPoints: SummaryDataPoint[] };
};

export interface SummaryMetricOptions {
  functionLabelKey: string;
  attributes: readonly CustomAttribute[];
  /** Wall-clock time in milliseconds since epoch. */
  nowMs: number;
}

/** Milliseconds → nanoseconds, truncated to the whole second. */
export function secondTruncatedNanos(nowMs: number): string {
  const seconds = BigInt(Math.floor(nowMs / 1000));
  return (seconds * NANOS_PER_SECOND).toString();
}

export function buildSummaryMetric(functionName: string, options: SummaryMetricOptions): SummaryMetric {
  const timestamp = secondTruncatedNanos(options.nowMs);

  const labels: SummaryLabel[] = [
    { key: 'Namespace', value: SUMMARY_NAMESPACE },
    { key: 'MetricName', value: SUMMARY_METRIC_LABEL },
    { key: options.functionLabelKey, value: functionName },
  ];
  for (const [key, value] of options.attributes) {
    labels.push({ key, value });
  }

  return {
    name: SUMMARY_METRIC_NAME,
    unit: SUMMARY_METRIC_UNIT,
    data: 'doubleSummary',
    doubleSummary: {
      dataPoints: [
        {
          labels,
          startTimeUnixNano: timestamp,
          timeUnixNano: timestamp,
          count: '1',
          sum: 1.0,
          quantileValues: [
            { quantile: 0.0, value: 1.0 }, // min
            { quantile: 1.0, value: 1.0 }, // max
          ],
        },
      ],
    },
  };
}
