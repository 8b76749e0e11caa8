// lib/jobs/jobStore.ts
import type { Redis } from 'ioredis';
import { redisConfig } from '../../config/redis';
import type { JobRecord, JobRecordFields, JobStatus } from '../../types/job';
import { createLogger } from '../logger';
import { decodeJobHash, encodeJobFields } from './jobRecord';

const logger = createLogger('job-store');

/**
 * `absent` only writes when no record exists; a status list only writes
 * when the stored status is one of them. Without a condition the write
 * merges unconditionally.
 */
export type WriteCondition = readonly JobStatus[] | 'absent';

export interface JobStore {
    get(jobId: string): Promise<JobRecord | null>;
    /**
     * Merges `fields` into the job's record and re-arms its TTL. Returns
     * false when `expect` did not hold and nothing was written.
     */
    write(
        jobId: string,
        fields: JobRecordFields,
        expect?: WriteCondition
    ): Promise<boolean>;
}

// ARGV: ttl, mode, allowed statuses (JSON array), then field/value pairs.
// Stored values are JSON, so the status field holds a quoted string.
const WRITE_SCRIPT = `
local key = KEYS[1]
local mode = ARGV[2]
if mode == 'absent' then
  if redis.call('EXISTS', key) == 1 then return 0 end
elseif mode == 'status' then
  local raw = redis.call('HGET', key, 'status')
  if not raw then return 0 end
  local current = cjson.decode(raw)
  local allowed = cjson.decode(ARGV[3])
  local matched = false
  for _, status in ipairs(allowed) do
    if status == current then matched = true end
  end
  if not matched then return 0 end
end
redis.call('HSET', key, unpack(ARGV, 4))
redis.call('EXPIRE', key, tonumber(ARGV[1]))
return 1
`;

export class RedisJobStore implements JobStore {
    constructor(
        private readonly client: Redis,
        private readonly ttlSeconds: number = redisConfig.jobStatusTtlSeconds,
        private readonly keyPrefix: string = redisConfig.jobKeyPrefix
    ) {}

    private key(jobId: string): string {
        return `${this.keyPrefix}${jobId}`;
    }

    async get(jobId: string): Promise<JobRecord | null> {
        const hash = await this.client.hgetall(this.key(jobId));
        const decoded = decodeJobHash(hash);
        if (!decoded) return null;

        if (!decoded.ok) {
            logger.warn({ jobId, reason: decoded.reason }, 'Unreadable job record in store');
            return null;
        }
        return decoded.record;
    }

    async write(
        jobId: string,
        fields: JobRecordFields,
        expect?: WriteCondition
    ): Promise<boolean> {
        const mode = expect === undefined ? 'any' : expect === 'absent' ? 'absent' : 'status';
        const allowed = typeof expect === 'object' ? expect : [];

        const written = await this.client.eval(
            WRITE_SCRIPT,
            1,
            this.key(jobId),
            String(this.ttlSeconds),
            mode,
            JSON.stringify(allowed),
            ...encodeJobFields({ ...fields, jobId })
        );

        return written === 1;
    }
}
