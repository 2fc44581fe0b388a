/**
 * Capture Store
 *
 * Write-once storage for `data_capture` actions. A key that has already
 * been captured is never overwritten.
 */

export interface CapturedRecord {
    readonly key: string;
    readonly instance: string;
    readonly state: string;
    readonly data: Readonly<Record<string, unknown>>;
    readonly capturedAt: string;
}

export interface CaptureStore {
    /** Returns false when the key was already captured. */
    capture(record: CapturedRecord): Promise<boolean>;
    get(key: string): Promise<CapturedRecord | null>;
}

export class InMemoryCaptureStore implements CaptureStore {
    private readonly records = new Map<string, CapturedRecord>();

    async capture(record: CapturedRecord): Promise<boolean> {
        if (this.records.has(record.key)) {
            return false;
        }
        this.records.set(record.key, Object.freeze({ ...record }));
        return true;
    }

    async get(key: string): Promise<CapturedRecord | null> {
        return this.records.get(key) ?? null;
    }

    keys(): string[] {
        return [...this.records.keys()];
    }
}
