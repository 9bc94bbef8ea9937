/**
 * Duplicate suppression by natural key.
 *
 * Backed by the keys already persisted plus keys accepted earlier in the
 * current batch, so intra-file duplicates are caught too. A null key
 * (profile without transaction ids) is never a duplicate.
 *
 * The check is advisory: concurrent imports must still rely on the store's
 * uniqueness constraint.
 */
export class DedupIndex {
    private readonly keys: Set<string>;

    constructor(existingKeys: Iterable<string> = []) {
        this.keys = new Set(existingKeys);
    }

    /**
     * True when the key was persisted before or accepted earlier in this batch.
     */
    seen(key: string | null): boolean {
        return key !== null && this.keys.has(key);
    }

    /**
     * Record a key accepted in the current batch.
     */
    remember(key: string | null): void {
        if (key !== null) {
            this.keys.add(key);
        }
    }

    get size(): number {
        return this.keys.size;
    }
}
