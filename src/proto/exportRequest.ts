/**
 * ExportMetricsServiceRequest codec backed by protobufjs reflection over the
 * OTLP 0.7.0 .proto files under proto/.
 *
 * decode: bytes → protobufjs message → plain object → zod-checked request
 * encode: request → fromObject → protobufjs writer
 *
 * Plain objects carry 64-bit integers as decimal strings so nanosecond
 * timestamps survive the round trip without precision loss.
 */

import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import protobuf from 'protobufjs';
import {
  ExportMetricsServiceRequestSchema,
  METRIC_KINDS,
  type ExportMetricsServiceRequest,
} from '../types/otlp.ts';
import { SchemaDecodeError, SchemaEncodeError, errorMessage } from '../util/errors.ts';

const PROTO_ROOT = fileURLToPath(new URL('../../proto', import.meta.url));
const ENTRY_PROTO = 'opentelemetry/proto/collector/metrics/v1/metrics_service.proto';
const REQUEST_TYPE = 'opentelemetry.proto.collector.metrics.v1.ExportMetricsServiceRequest';

const TO_OBJECT_OPTIONS: protobuf.IConversionOptions = {
  longs: String,
  bytes: String,
  arrays: true,
  oneofs: true,
};

let requestType: protobuf.Type | null = null;

function getRequestType(): protobuf.Type {
  if (!requestType) {
    const root = new protobuf.Root();
    // Imports in the .proto files are relative to the proto/ root, not to the importing file.
    root.resolvePath = (_origin, target) => join(PROTO_ROOT, target);
    root.loadSync(ENTRY_PROTO);
    requestType = root.lookupType(REQUEST_TYPE);
  }
  return requestType;
}

export function decodeExportRequest(bytes: Uint8Array): ExportMetricsServiceRequest {
  const type = getRequestType();
  let plain: Record<string, unknown>;
  try {
    plain = type.toObject(type.decode(bytes), TO_OBJECT_OPTIONS);
  } catch (err) {
    throw new SchemaDecodeError(`Malformed ExportMetricsServiceRequest: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  const parsed = ExportMetricsServiceRequestSchema.safeParse(plain);
  if (!parsed.success) {
    throw new SchemaDecodeError(
      `Unexpected ExportMetricsServiceRequest shape: ${parsed.error.message}`,
      { cause: parsed.error }
    );
  }
  assertSingleVariant(parsed.data);
  return parsed.data;
}

/**
 * protobufjs keeps every `data` member it reads instead of letting the last
 * one on the wire replace the others, and would re-encode them all.
 */
function assertSingleVariant(request: ExportMetricsServiceRequest): void {
  for (const rm of request.resourceMetrics) {
    for (const scope of rm.instrumentationLibraryMetrics) {
      for (const metric of scope.metrics) {
        const populated = METRIC_KINDS.filter((kind) => Object.hasOwn(metric, kind));
        if (populated.length > 1) {
          throw new SchemaDecodeError(
            `Metric "${metric.name ?? ''}" sets more than one data variant: ${populated.join(', ')}`
          );
        }
      }
    }
  }
}

export function encodeExportRequest(request: ExportMetricsServiceRequest): Uint8Array {
  const type = getRequestType();
  try {
    return type.encode(type.fromObject(request)).finish();
  } catch (err) {
    throw new SchemaEncodeError(`Cannot encode ExportMetricsServiceRequest: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}
