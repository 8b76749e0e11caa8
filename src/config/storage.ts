// config/storage.ts
import env from './env';

export const storageConfig = {
    provider: env.STORAGE_PROVIDER,

    local: {
        uploadDir: env.LOCAL_UPLOAD_DIR,
        publicBaseUrl: env.PUBLIC_BASE_URL,
    },

    // Results above this size are written to the blob store instead of the job record
    inlineResultLimitBytes: 64 * 1024,
};
