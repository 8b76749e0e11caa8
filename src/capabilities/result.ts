// capabilities/result.ts
import { storageConfig } from '../config/storage';
import type { BlobStore } from '../types/collaborators';
import type { JsonObject } from '../types/job';

/**
 * Keeps `result` on the job record when it is small; otherwise writes it to
 * the blob store and leaves a pointer plus `summary` behind.
 */
export async function inlineOrStore(
    result: JsonObject,
    summary: JsonObject,
    blobStore: BlobStore,
    folder: string,
    limitBytes: number = storageConfig.inlineResultLimitBytes
): Promise<JsonObject> {
    const body = Buffer.from(JSON.stringify(result), 'utf8');
    if (body.length <= limitBytes) return result;

    const stored = await blobStore.store(body, {
        folder,
        extension: 'json',
        contentType: 'application/json',
    });

    return { ...summary, result_url: stored.url, result_ref: stored.ref };
}
