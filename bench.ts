import { bench, group, run } from 'mitata';
import { intVarintSize, readVarint32, writeIntVarint } from './src/util/varint.ts';
import { decodeStream, encodeStream } from './src/proto/delimitedStream.ts';
import { decodeExportRequest, encodeExportRequest } from './src/proto/exportRequest.ts';
import { findFunctionMatches } from './src/transform/matchFunctions.ts';
import { MetricAugmenter } from './src/core/MetricAugmenter.ts';
import { createLogger } from './src/util/logger.ts';
import type { ExportMetricsServiceRequest } from './src/types/otlp.ts';

// ─── Fixtures ──────────────────────────────────────────────────────────────

function makeLambdaRequest(functionCount: number, metricsPerFunction: number): ExportMetricsServiceRequest {
  return {
    resourceMetrics: [
      {
        resource: { attributes: [{ key: 'cloud.provider', value: { stringValue: 'aws' } }] },
        instrumentationLibraryMetrics: [
          {
            instrumentationLibrary: { name: 'cloudwatch', version: '1.0' },
            metrics: Array.from({ length: functionCount * metricsPerFunction }, (_, mi) => ({
              name: `amazonaws.com/AWS/Lambda/Metric${mi % metricsPerFunction}`,
              unit: '{Count}',
              data: 'doubleSummary' as const,
              doubleSummary: {
                dataPoints: [
                  {
                    labels: [
                      { key: 'Namespace', value: 'AWS/Lambda' },
                      { key: 'MetricName', value: `Metric${mi % metricsPerFunction}` },
                      { key: 'FunctionName', value: `fn-${Math.floor(mi / metricsPerFunction)}` },
                    ],
                    startTimeUnixNano: '1700000000000000000',
                    timeUnixNano: '1700000060000000000',
                    count: '3',
                    sum: 42.5,
                    quantileValues: [
                      { quantile: 0, value: 1.5 },
                      { quantile: 1, value: 30 },
                    ],
                  },
                ],
              },
            })),
          },
        ],
      },
    ],
  };
}

const smallRequest = makeLambdaRequest(1, 4);     // 4 metrics
const largeRequest = makeLambdaRequest(50, 10);   // 500 metrics

const smallMessage = encodeExportRequest(smallRequest);
const largeMessage = encodeExportRequest(largeRequest);

const smallStream = encodeStream([smallMessage]);
const largeStream = encodeStream(Array.from({ length: 20 }, () => largeMessage));

const rule = {
  targetFunctions: new Set(['fn-0', 'fn-7', 'fn-42']),
  functionLabelKey: 'FunctionName',
};

const augmenter = new MetricAugmenter()
  .targetFunctions(rule.targetFunctions)
  .attribute('team', 'bench')
  .logger(createLogger('silent'))
  .build();

const varintBuf = new Uint8Array(5);
writeIntVarint(varintBuf, 0, 4294967295);

// ─── Benchmarks ────────────────────────────────────────────────────────────

group('varint', () => {
  bench('write 300', () => writeIntVarint(varintBuf, 0, 300));
  bench('size 2^31', () => intVarintSize(2147483648));
  bench('read 2^32 - 1', () => readVarint32(varintBuf, 0));
});

group('framing', () => {
  bench(`decode 20 frames (~${largeStream.length}B)`, () => decodeStream(largeStream));
  bench('encode 20 frames', () => encodeStream(Array.from({ length: 20 }, () => largeMessage)));
});

group('message codec', () => {
  bench('decode 4 metrics', () => decodeExportRequest(smallMessage));
  bench('decode 500 metrics', () => decodeExportRequest(largeMessage));
  bench('encode 500 metrics', () => encodeExportRequest(largeRequest));
});

group('matcher', () => {
  bench('500 metrics, 3 targets', () => findFunctionMatches(largeRequest, rule));
});

group('pipeline end-to-end', () => {
  bench('1 frame, 4 metrics', () => augmenter.processPayload(smallStream));
  bench('20 frames × 500 metrics', () => augmenter.processPayload(largeStream));
});

await run({ format: 'mitata', colors: true });
