/**
 * Kinesis Data Firehose data-transformation adapter for the pipeline.
 */

import type { FirehoseTransformationEvent, FirehoseTransformationResult } from 'aws-lambda';
import type { Logger } from 'pino';
import type { Pipeline } from '../core/Pipeline.ts';

export type FirehoseHandler = (event: FirehoseTransformationEvent) => Promise<FirehoseTransformationResult>;

/**
 * Run every record through the pipeline, in order.
 * Failed records are returned with their original base64 data verbatim.
 */
export function transformFirehoseEvent(
  pipeline: Pipeline,
  event: FirehoseTransformationEvent,
  logger: Logger
): FirehoseTransformationResult {
  let failed = 0;
  const records = event.records.map((record) => {
    const outcome = pipeline.processRecord(record.recordId, Buffer.from(record.data, 'base64'));
    if (outcome.result === 'Ok') {
      return {
        recordId: record.recordId,
        result: outcome.result,
        data: Buffer.from(outcome.data).toString('base64'),
      };
    }
    failed++;
    return { recordId: record.recordId, result: outcome.result, data: record.data };
  });

  logger.info({ records: records.length, ok: records.length - failed, failed }, 'processed records');
  return { records };
}

/** Lambda handler for a Firehose transformation function. */
export function firehoseHandler(pipeline: Pipeline, logger: Logger): FirehoseHandler {
  return async (event: FirehoseTransformationEvent): Promise<FirehoseTransformationResult> =>
    transformFirehoseEvent(pipeline, event, logger);
}
