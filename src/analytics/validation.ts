/**
 * TELEMETRY PAYLOAD VALIDATION
 * =============================
 *
 * Wire format accepted by the ingestion endpoint, and checks on core samples.
 */

import { z } from 'zod';
import { ValidationError } from './errors';
import type { IngestContext, Sample } from './types';

/**
 * Device telemetry as posted by devices. `cpu` is the analysed value.
 */
export const TelemetryPayloadSchema = z.object({
  timestamp: z
    .number({ required_error: 'timestamp is required', invalid_type_error: 'timestamp must be a number' })
    .int('timestamp must be an integer'),
  device_id: z
    .string({ required_error: 'device_id is required', invalid_type_error: 'device_id must be a string' })
    .min(1, 'device_id is required'),
  cpu: z
    .number({ required_error: 'cpu is required', invalid_type_error: 'cpu must be a number' })
    .finite('cpu must be finite'),
  rps: z.number({ invalid_type_error: 'rps must be a number' }).finite('rps must be finite').optional().default(0),
  memory: z.number({ invalid_type_error: 'memory must be a number' }).finite('memory must be finite').optional().default(0),
});

export type TelemetryPayload = z.infer<typeof TelemetryPayloadSchema>;

/**
 * Parse an untrusted request body.
 * A missing device id is reported ahead of any other field problem.
 */
export function parseTelemetryPayload(body: unknown): TelemetryPayload {
  const parsed = TelemetryPayloadSchema.safeParse(body);
  if (parsed.success) {
    return parsed.data;
  }

  const issues = parsed.error.issues;
  const issue = issues.find(i => i.path[0] === 'device_id') ?? issues[0];

  // Body is not an object at all
  if (issue.path.length === 0) {
    throw new ValidationError('Invalid JSON');
  }

  const field = String(issue.path[0]);
  throw new ValidationError(issue.message, field);
}

export function toSample(payload: TelemetryPayload): Sample {
  return {
    timestamp: payload.timestamp,
    entityId: payload.device_id,
    value: payload.cpu,
  };
}

export function toIngestContext(payload: TelemetryPayload): IngestContext {
  return {
    rate: payload.rps,
    memory: payload.memory,
  };
}

/**
 * Checks applied to samples handed to the core directly
 */
export function validateSample(sample: Sample): void {
  if (typeof sample.entityId !== 'string' || sample.entityId.length === 0) {
    throw new ValidationError('device_id is required', 'entityId');
  }
  if (!Number.isInteger(sample.timestamp)) {
    throw new ValidationError('timestamp must be an integer', 'timestamp');
  }
  if (!Number.isFinite(sample.value)) {
    throw new ValidationError('value must be a finite number', 'value');
  }
}
