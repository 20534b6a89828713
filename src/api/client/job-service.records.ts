import { ApiError } from '@/api/middleware/error.handler.js';
import { JobPage, JobRecord } from '@/types/job.types.js';
import { InstancePage, InstanceRecord, PlatformRecord } from '@/types/listing.types.js';

/**
 * Parsers from job service JSON into the gateway's records.
 *
 * Mapped fields keep their upstream values; everything else lands in
 * `attributes`. A body that does not have the expected structure is an
 * UPSTREAM_ERROR, never a silently shortened list.
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function malformed(what: string, reason: string): ApiError {
  return ApiError.upstreamError(`Job service returned a malformed ${what}: ${reason}`);
}

/**
 * Reads mapped fields and remembers which keys were consumed
 */
class FieldReader {
  private readonly consumed = new Set<string>();

  constructor(private readonly source: Record<string, unknown>) {}

  string(...keys: string[]): string | null {
    for (const key of keys) {
      const value = this.source[key];
      if (typeof value === 'string') {
        this.consumed.add(key);
        return value;
      }
    }
    return null;
  }

  boolean(...keys: string[]): boolean | null {
    for (const key of keys) {
      const value = this.source[key];
      if (typeof value === 'boolean') {
        this.consumed.add(key);
        return value;
      }
    }
    return null;
  }

  rest(): Record<string, unknown> {
    const attributes: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(this.source)) {
      if (!this.consumed.has(key)) {
        attributes[key] = value;
      }
    }
    return attributes;
  }
}

export function parseJobRecord(value: unknown): JobRecord {
  if (!isRecord(value)) {
    throw malformed('job record', 'expected an object');
  }

  const fields = new FieldReader(value);
  const jobId = fields.string('JobRequestID');
  if (jobId === null || jobId.length === 0) {
    throw malformed('job record', 'JobRequestID is missing');
  }

  // Timestamps and owner may only exist in the nested Metadata block,
  // which itself stays in attributes
  const metadata = isRecord(value.Metadata) ? value.Metadata : {};
  const fromMetadata = (key: string): string | null => {
    const nested = metadata[key];
    return typeof nested === 'string' ? nested : null;
  };

  return {
    job_id: jobId,
    name: fields.string('Name'),
    status: fields.string('JobRequestStatus'),
    job_type: fields.string('Type'),
    tenant_id: fields.string('TenantID', 'tenant_id', 'TenantId'),
    platform_id: fields.string('PlatformID'),
    owner: fields.string('RequestedBy') ?? fromMetadata('RequestedBy'),
    queue: fields.string('Queue'),
    created_at: fields.string('RequestedOn') ?? fromMetadata('RequestedOn'),
    completed_at: fields.string('CompletedOn'),
    last_updated_at: fields.string('LastUpdatedOn') ?? fromMetadata('LastUpdatedOn'),
    description: fields.string('Description'),
    attributes: fields.rest()
  };
}

export function parseJobPage(body: unknown): JobPage {
  if (!isRecord(body)) {
    throw malformed('job listing', 'expected a JSON object');
  }

  if (!Array.isArray(body.Jobs)) {
    throw malformed('job listing', 'Jobs is not a list');
  }

  const jobs = body.Jobs.map(parseJobRecord);
  const token = body.ContinuationToken;

  return {
    jobs,
    count: typeof body.Count === 'number' ? body.Count : jobs.length,
    continuationToken: typeof token === 'string' && token.length > 0 ? token : null
  };
}

export function parseInstanceRecord(value: unknown): InstanceRecord {
  if (!isRecord(value)) {
    throw malformed('instance record', 'expected an object');
  }

  const fields = new FieldReader(value);
  const instanceId = fields.string('instance_id', 'InstanceID');
  if (instanceId === null || instanceId.length === 0) {
    throw malformed('instance record', 'instance_id is missing');
  }

  return {
    instance_id: instanceId,
    name: fields.string('name', 'Name'),
    platform_id: fields.string('platform_id', 'PlatformID'),
    platform_name: fields.string('platform_name', 'PlatformName'),
    status: fields.string('status', 'Status'),
    is_available: fields.boolean('is_available', 'IsAvailable'),
    attributes: fields.rest()
  };
}

export function parseInstancePage(body: unknown): InstancePage {
  if (!isRecord(body)) {
    throw malformed('instance listing', 'expected a JSON object');
  }

  if (!Array.isArray(body.instances)) {
    throw malformed('instance listing', 'instances is not a list');
  }

  const total = typeof body.total === 'number'
    ? body.total
    : typeof body.count === 'number' ? body.count : null;

  return {
    instances: body.instances.map(parseInstanceRecord),
    total
  };
}

export function parsePlatformRecord(value: unknown): PlatformRecord {
  if (!isRecord(value)) {
    throw malformed('platform record', 'expected an object');
  }

  const fields = new FieldReader(value);
  const platformId = fields.string('PlatformID', 'platform_id');
  if (platformId === null || platformId.length === 0) {
    throw malformed('platform record', 'PlatformID is missing');
  }

  return {
    platform_id: platformId,
    name: fields.string('PlatformName', 'name'),
    platform_type: fields.string('PlatformType', 'platform_type'),
    description: fields.string('Description', 'description'),
    attributes: fields.rest()
  };
}

export function parsePlatformList(body: unknown): PlatformRecord[] {
  if (!isRecord(body)) {
    throw malformed('platform listing', 'expected a JSON object');
  }

  const list = Array.isArray(body.Platforms) ? body.Platforms : body.platforms;
  if (!Array.isArray(list)) {
    throw malformed('platform listing', 'Platforms is not a list');
  }

  return list.map(parsePlatformRecord);
}
