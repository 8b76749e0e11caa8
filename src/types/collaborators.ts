// types/collaborators.ts
// Narrow contracts the job core consumes from billing, storage, auth and AI.

export type ReservationResult =
    | { ok: true; balance: number }
    | { ok: false; balance: number };

export interface CostLedger {
    /**
     * Atomically charges `amount` against the user's balance. Never partially
     * applies; an insufficient balance leaves the balance untouched.
     */
    reserve(
        userId: string,
        amount: number,
        reference: { service: string; jobId?: string }
    ): Promise<ReservationResult>;
    isReserved(jobId: string): Promise<boolean>;
}

export interface StoredBlob {
    ref: string;
    url: string;
}

export interface BlobStore {
    fetch(ref: string): Promise<Buffer>;
    store(
        bytes: Buffer,
        options: { folder: string; extension: string; contentType: string }
    ): Promise<StoredBlob>;
}

export interface AuthContext {
    currentUser(): string;
}
