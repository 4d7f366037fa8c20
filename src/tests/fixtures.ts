import { pino } from 'pino';
import type { FirehoseTransformationEvent } from 'aws-lambda';
import type { ExportMetricsServiceRequest, Metric } from '../types/otlp.ts';
import { encodeExportRequest } from '../proto/exportRequest.ts';
import { encodeStream } from '../proto/delimitedStream.ts';

export const silentLogger = pino({ level: 'silent' });

/** 2023-11-14T22:13:20.750Z */
export const FIXED_NOW_MS = 1_700_000_000_750;
export const FIXED_NOW_NANOS = '1700000000000000000';

export function gaugeMetric(name: string, labels: Record<string, string>): Metric {
  return {
    name,
    unit: '{Count}',
    data: 'doubleGauge',
    doubleGauge: {
      dataPoints: [
        {
          labels: Object.entries(labels).map(([key, value]) => ({ key, value })),
          timeUnixNano: '1699999940000000000',
          value: 3,
        },
      ],
    },
  };
}

export function lambdaMetric(metricName: string, functionName: string): Metric {
  return {
    name: `amazonaws.com/AWS/Lambda/${metricName}`,
    unit: '{Count}',
    data: 'doubleSummary',
    doubleSummary: {
      dataPoints: [
        {
          labels: [
            { key: 'Namespace', value: 'AWS/Lambda' },
            { key: 'MetricName', value: metricName },
            { key: 'FunctionName', value: functionName },
          ],
          startTimeUnixNano: '1699999940000000000',
          timeUnixNano: '1700000000000000000',
          count: '2',
          sum: 7,
          quantileValues: [
            { quantile: 0, value: 3 },
            { quantile: 1, value: 4 },
          ],
        },
      ],
    },
  };
}

/** One resource, one scope per entry of `scopes`. */
export function requestWithScopes(...scopes: Metric[][]): ExportMetricsServiceRequest {
  return {
    resourceMetrics: [
      {
        resource: { attributes: [{ key: 'cloud.region', value: { stringValue: 'eu-west-1' } }] },
        instrumentationLibraryMetrics: scopes.map((metrics) => ({
          instrumentationLibrary: { name: 'cloudwatch-metric-streams' },
          metrics,
        })),
      },
    ],
  };
}

export function streamOf(...requests: ExportMetricsServiceRequest[]): Uint8Array {
  return encodeStream(requests.map(encodeExportRequest));
}

export function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64');
}

export function fromBase64(data: string | undefined): Uint8Array {
  return new Uint8Array(Buffer.from(data ?? '', 'base64'));
}

export function firehoseEvent(...payloads: string[]): FirehoseTransformationEvent {
  return {
    invocationId: 'invocation-1',
    deliveryStreamArn: 'arn:aws:firehose:eu-west-1:123456789012:deliverystream/metric-stream',
    region: 'eu-west-1',
    records: payloads.map((data, i) => ({
      recordId: `record-${i}`,
      approximateArrivalTimestamp: 1_700_000_000_000,
      data,
    })),
  };
}
