// lib/storage/localStorage.ts
import fs from 'fs/promises';
import path from 'path';
import crypto from 'crypto';
import { storageConfig } from '../../config/storage';
import type { BlobStore, StoredBlob } from '../../types/collaborators';

export interface BlobStoreOptions {
    folder: string;
    extension: string;
    contentType: string;
}

export class LocalBlobStore implements BlobStore {
    private readonly baseDir: string;

    constructor(
        baseDir: string = storageConfig.local.uploadDir,
        private readonly publicBaseUrl: string = storageConfig.local.publicBaseUrl
    ) {
        this.baseDir = path.resolve(baseDir);
    }

    private resolve(ref: string): string {
        const fullPath = path.resolve(this.baseDir, ref);
        if (!fullPath.startsWith(this.baseDir + path.sep)) {
            throw new Error(`Blob reference escapes storage root: ${ref}`);
        }
        return fullPath;
    }

    async store(bytes: Buffer, options: BlobStoreOptions): Promise<StoredBlob> {
        const folderPath = this.resolve(options.folder);
        await fs.mkdir(folderPath, { recursive: true });

        // Generate unique filename
        const timestamp = Date.now();
        const randomStr = crypto.randomBytes(8).toString('hex');
        const extension = options.extension.replace(/^\./, '');
        const filename = `${timestamp}-${randomStr}.${extension}`;

        const ref = path.posix.join(options.folder, filename);
        await fs.writeFile(this.resolve(ref), bytes);

        return { ref, url: this.getUrl(ref) };
    }

    async fetch(ref: string): Promise<Buffer> {
        return fs.readFile(this.resolve(ref));
    }

    getUrl(ref: string): string {
        return `${this.publicBaseUrl.replace(/\/$/, '')}/uploads/${ref}`;
    }
}
