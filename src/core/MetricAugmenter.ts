// MetricAugmenter fluent builder and built instance.
//
// Usage:
//   const augmenter = new MetricAugmenter()
//     .targetFunctions(['checkout-api', 'orders-worker'])
//     .attribute('team', 'payments')
//     .build();
//
//   export const handler = augmenter.firehoseHandler();
//
// Or straight from the environment:
//   export const handler = MetricAugmenter.fromConfig(loadConfig()).build().firehoseHandler();

import type { FirehoseTransformationEvent, FirehoseTransformationResult } from 'aws-lambda';
import type { Logger } from 'pino';
import {
  DEFAULT_FUNCTION_LABEL_KEY,
  resolveAugmentation,
  type AugmenterConfig,
} from './AugmenterConfig.ts';
import { Pipeline, type Clock } from './Pipeline.ts';
import { firehoseHandler, transformFirehoseEvent, type FirehoseHandler } from '../adapters/firehose.ts';
import type { CustomAttribute } from '../transform/summaryMetric.ts';
import { createLogger } from '../util/logger.ts';

/** MetricAugmenter fluent builder. */
export class MetricAugmenter {
  private _targetFunctions: string[] = [];
  private _functionLabelKey = DEFAULT_FUNCTION_LABEL_KEY;
  private _attributes: CustomAttribute[] = [];
  private _logger?: Logger;
  private _clock: Clock = Date.now;

  /** Builder pre-filled from an environment-loaded configuration. */
  static fromConfig(config: AugmenterConfig): MetricAugmenter {
    const logger = createLogger(config.logLevel);
    for (const warning of config.warnings) {
      logger.warn(warning);
    }
    const builder = new MetricAugmenter()
      .targetFunctions(config.targetFunctions)
      .functionLabelKey(config.functionLabelKey)
      .logger(logger);
    if (config.attributeKey !== undefined && config.attributeValue !== undefined) {
      builder.attribute(config.attributeKey, config.attributeValue);
    }
    return builder;
  }

  /** Add function names whose metrics get a custom summary. */
  targetFunctions(names: Iterable<string>): this {
    this._targetFunctions = [...this._targetFunctions, ...names];
    return this;
  }

  /** Label identifying the function on each data point. Defaults to "FunctionName". */
  functionLabelKey(key: string): this {
    this._functionLabelKey = key;
    return this;
  }

  /** Add a custom attribute; attributes become summary labels in the order added. */
  attribute(key: string, value: string): this {
    this._attributes = [...this._attributes, [key, value]];
    return this;
  }

  logger(logger: Logger): this {
    this._logger = logger;
    return this;
  }

  /** Millisecond clock for summary timestamps. Defaults to Date.now. */
  clock(clock: Clock): this {
    this._clock = clock;
    return this;
  }

  /**
   * Build the configured pipeline. Never throws: an incomplete configuration
   * yields a pipeline that re-encodes records without augmenting them.
   */
  build(): BuiltMetricAugmenter {
    const logger = this._logger ?? createLogger();
    const settings = resolveAugmentation({
      targetFunctions: this._targetFunctions,
      functionLabelKey: this._functionLabelKey,
      attributes: this._attributes,
    });
    if (settings.status === 'incomplete') {
      logger.warn({ missing: settings.missing }, 'required configuration is not set, skipping augmentation');
    }
    const pipeline = new Pipeline(settings, logger, this._clock);
    return new BuiltMetricAugmenter(pipeline, logger);
  }
}

/** A configured, built augmenter ready to handle Firehose invocations. */
export class BuiltMetricAugmenter {
  constructor(
    private readonly pipeline: Pipeline,
    private readonly logger: Logger
  ) {}

  /**
   * Returns a Lambda handler for a Firehose data-transformation function.
   *
   * Usage: export const handler = augmenter.firehoseHandler();
   */
  firehoseHandler(): FirehoseHandler {
    return firehoseHandler(this.pipeline, this.logger);
  }

  /** Transform one Firehose event synchronously. */
  transform(event: FirehoseTransformationEvent): FirehoseTransformationResult {
    return transformFirehoseEvent(this.pipeline, event, this.logger);
  }

  /** Transform one raw length-delimited payload. Throws on malformed input. */
  processPayload(payload: Uint8Array): Uint8Array {
    return this.pipeline.processPayload(payload);
  }

  /** Direct access to the pipeline for advanced use cases or testing. */
  get rawPipeline(): Pipeline {
    return this.pipeline;
  }
}
