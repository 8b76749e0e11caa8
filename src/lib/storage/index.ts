// lib/storage/index.ts
import { LocalBlobStore } from './localStorage';
import { storageConfig } from '../../config/storage';
import type { BlobStore } from '../../types/collaborators';

// Factory pattern for storage providers
export const getBlobStore = (): BlobStore => {
    switch (storageConfig.provider) {
        case 'local':
            return new LocalBlobStore();
    }
};

export const blobStore = getBlobStore();

export { LocalBlobStore } from './localStorage';
