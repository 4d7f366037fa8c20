/**
 * OTLP 0.7.0 metrics types (the format CloudWatch metric streams emit).
 *
 * Only the path the augmenter walks is typed:
 *   request → resourceMetrics → instrumentationLibraryMetrics → metrics
 *     → <data variant> → dataPoints → labels
 * Everything else (resource, timestamps, values, exemplars, buckets) is
 * carried through untouched via `passthrough()`.
 *
 * Field names are the protobufjs camelCase forms; 64-bit integers are decimal
 * strings and `data` names the populated oneof member.
 */

import { z } from 'zod';

export const StringKeyValueSchema = z
  .object({
    key: z.string().optional(),
    value: z.string().optional(),
  })
  .passthrough();

export const DataPointSchema = z
  .object({
    labels: z.array(StringKeyValueSchema),
  })
  .passthrough();

/** Shape shared by every metric variant: a list of labelled data points. */
export const DataPointsSchema = z
  .object({
    dataPoints: z.array(DataPointSchema),
  })
  .passthrough();

const MetricBaseSchema = z
  .object({
    name: z.string().optional(),
    description: z.string().optional(),
    unit: z.string().optional(),
  })
  .passthrough();

export const MetricSchema = z.union([
  MetricBaseSchema.extend({ data: z.literal('intGauge'), intGauge: DataPointsSchema }),
  MetricBaseSchema.extend({ data: z.literal('doubleGauge'), doubleGauge: DataPointsSchema }),
  MetricBaseSchema.extend({ data: z.literal('intSum'), intSum: DataPointsSchema }),
  MetricBaseSchema.extend({ data: z.literal('doubleSum'), doubleSum: DataPointsSchema }),
  MetricBaseSchema.extend({ data: z.literal('intHistogram'), intHistogram: DataPointsSchema }),
  MetricBaseSchema.extend({ data: z.literal('doubleHistogram'), doubleHistogram: DataPointsSchema }),
  MetricBaseSchema.extend({ data: z.literal('doubleSummary'), doubleSummary: DataPointsSchema }),
  // No oneof member populated.
  MetricBaseSchema.extend({ data: z.undefined() }),
]);

export const InstrumentationLibraryMetricsSchema = z
  .object({
    metrics: z.array(MetricSchema),
  })
  .passthrough();

export const ResourceMetricsSchema = z
  .object({
    instrumentationLibraryMetrics: z.array(InstrumentationLibraryMetricsSchema),
  })
  .passthrough();

export const ExportMetricsServiceRequestSchema = z
  .object({
    resourceMetrics: z.array(ResourceMetricsSchema),
  })
  .passthrough();

export type StringKeyValue = z.infer<typeof StringKeyValueSchema>;
export type DataPoint = z.infer<typeof DataPointSchema>;
export type Metric = z.infer<typeof MetricSchema>;
export type MetricKind = NonNullable<Metric['data']>;
/** Members of the Metric `data` oneof, in field-number order. */
export const METRIC_KINDS = [
  'intGauge',
  'doubleGauge',
  'intSum',
  'doubleSum',
  'intHistogram',
  'doubleHistogram',
  'doubleSummary',
] as const satisfies readonly MetricKind[];

export type InstrumentationLibraryMetrics = z.infer<typeof InstrumentationLibraryMetricsSchema>;
export type ResourceMetrics = z.infer<typeof ResourceMetricsSchema>;
export type ExportMetricsServiceRequest = z.infer<typeof ExportMetricsServiceRequestSchema>;

function assertNever(value: never): never {
  throw new Error(`Unhandled metric variant: ${JSON.stringify(value)}`);
}

/** Data points of whichever variant is populated; empty when none is. */
export function metricDataPoints(metric: Metric): DataPoint[] {
  switch (metric.data) {
    case 'intGauge':
      return metric.intGauge.dataPoints;
    case 'doubleGauge':
      return metric.doubleGauge.dataPoints;
    case 'intSum':
      return metric.intSum.dataPoints;
    case 'doubleSum':
      return metric.doubleSum.dataPoints;
    case 'intHistogram':
      return metric.intHistogram.dataPoints;
    case 'doubleHistogram':
      return metric.doubleHistogram.dataPoints;
    case 'doubleSummary':
      return metric.doubleSummary.dataPoints;
    case undefined:
      return [];
    default:
      return assertNever(metric);
  }
}
