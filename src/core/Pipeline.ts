/**
 * Stateless pipeline: processPayload(bytes) → bytes
 *
 * Steps:
 *  1. Split the length-delimited stream into frames
 *  2. Decode each frame as an ExportMetricsServiceRequest
 *  3. If augmentation is enabled, match target functions and append summaries
 *  4. Encode each request
 *  5. Re-join the frames
 *
 * processRecord wraps the above so that a failing record never affects its
 * neighbours: it comes back as ProcessingFailed carrying its original bytes.
 */

import type { Logger } from 'pino';
import type { AugmentationSettings } from './AugmenterConfig.ts';
import { decodeStream, encodeStream } from '../proto/delimitedStream.ts';
import { decodeExportRequest, encodeExportRequest } from '../proto/exportRequest.ts';
import { augmentRequest } from '../transform/augment.ts';

export type Clock = () => number;

export type RecordResult =
  | { recordId: string; result: 'Ok'; data: Uint8Array }
  | { recordId: string; result: 'ProcessingFailed'; data: Uint8Array; error: unknown };

export class Pipeline {
  constructor(
    private readonly augmentation: AugmentationSettings,
    private readonly logger: Logger,
    private readonly clock: Clock = Date.now
  ) {}

  /** Throws FramingError, SchemaDecodeError or SchemaEncodeError. */
  processPayload(payload: Uint8Array): Uint8Array {
    const requests = decodeStream(payload).map(decodeExportRequest);

    if (this.augmentation.status === 'enabled') {
      const { rule } = this.augmentation;
      const nowMs = this.clock();
      for (const request of requests) {
        for (const match of augmentRequest(request, rule, nowMs)) {
          for (const functionName of match.functionNames) {
            this.logger.info({ functionName }, 'match found, appended custom summary metric');
          }
        }
      }
    }

    return encodeStream(requests.map(encodeExportRequest));
  }

  processRecord(recordId: string, payload: Uint8Array): RecordResult {
    try {
      return { recordId, result: 'Ok', data: this.processPayload(payload) };
    } catch (err) {
      this.logger.error({ err, recordId }, 'processing failed for record');
      return { recordId, result: 'ProcessingFailed', data: payload, error: err };
    }
  }
}
