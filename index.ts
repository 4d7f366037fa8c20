// otlp-metric-augmenter — Firehose transform that tags OTLP 0.7.0 metric streams with custom summaries

// Core builder
export { MetricAugmenter, BuiltMetricAugmenter } from './src/core/MetricAugmenter.ts';

// Pipeline (for advanced/testing use)
export { Pipeline } from './src/core/Pipeline.ts';
export type { RecordResult, Clock } from './src/core/Pipeline.ts';

// Configuration
export {
  loadConfig,
  resolveAugmentation,
  DEFAULT_FUNCTION_LABEL_KEY,
} from './src/core/AugmenterConfig.ts';
export type {
  AugmenterConfig,
  AugmentationInput,
  AugmentationSettings,
  LogLevel,
} from './src/core/AugmenterConfig.ts';

// Adapters
export { firehoseHandler, transformFirehoseEvent } from './src/adapters/firehose.ts';
export type { FirehoseHandler } from './src/adapters/firehose.ts';

// Types
export type {
  ExportMetricsServiceRequest,
  ResourceMetrics,
  InstrumentationLibraryMetrics,
  Metric,
  MetricKind,
  DataPoint,
  StringKeyValue,
} from './src/types/otlp.ts';
export { metricDataPoints } from './src/types/otlp.ts';

// Transform utilities (for advanced use)
export { findFunctionMatches } from './src/transform/matchFunctions.ts';
export type { MatchRule, ScopeMatch } from './src/transform/matchFunctions.ts';
export { augmentRequest } from './src/transform/augment.ts';
export type { AugmentationRule } from './src/transform/augment.ts';
export {
  buildSummaryMetric,
  SUMMARY_METRIC_NAME,
  SUMMARY_METRIC_UNIT,
} from './src/transform/summaryMetric.ts';
export type { CustomAttribute, SummaryMetric } from './src/transform/summaryMetric.ts';

// Proto encoding (for advanced use)
export { decodeStream, encodeStream } from './src/proto/delimitedStream.ts';
export { decodeExportRequest, encodeExportRequest } from './src/proto/exportRequest.ts';

// Errors & logging
export { FramingError, SchemaDecodeError, SchemaEncodeError } from './src/util/errors.ts';
export { createLogger } from './src/util/logger.ts';
