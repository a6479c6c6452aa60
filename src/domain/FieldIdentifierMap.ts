import { FieldIdentifier } from './valueObjects/FieldIdentifier.js';

interface Entry<V> {
    key: FieldIdentifier;
    value: V;
}

/**
 * Map keyed by FieldIdentifier value equality.
 *
 * A plain Map would compare identifier instances by reference, so two
 * identifiers built separately for the same field would be different keys.
 * Entries are bucketed by hashCode() and matched with equals(); iteration
 * follows insertion order.
 */
export class FieldIdentifierMap<V> implements Iterable<[FieldIdentifier, V]> {
    private readonly buckets: Map<number, Entry<V>[]> = new Map();
    // Insertion order across buckets.
    private readonly order: Set<Entry<V>> = new Set();

    constructor(entries?: Iterable<readonly [FieldIdentifier, V]>) {
        if (entries) {
            for (const [key, value] of entries) {
                this.set(key, value);
            }
        }
    }

    get size(): number {
        return this.order.size;
    }

    get(key: FieldIdentifier): V | undefined {
        return this.find(key)?.value;
    }

    has(key: FieldIdentifier): boolean {
        return this.find(key) !== undefined;
    }

    set(key: FieldIdentifier, value: V): this {
        const existing = this.find(key);
        if (existing) {
            existing.value = value;
            return this;
        }

        const entry: Entry<V> = { key, value };
        const hash = key.hashCode();
        const bucket = this.buckets.get(hash);
        if (bucket) {
            bucket.push(entry);
        } else {
            this.buckets.set(hash, [entry]);
        }
        this.order.add(entry);
        return this;
    }

    /**
     * Returns the value for `key`, storing `factory(key)` first if there is none.
     */
    getOrAdd(key: FieldIdentifier, factory: (key: FieldIdentifier) => V): V {
        const existing = this.find(key);
        if (existing) {
            return existing.value;
        }
        const value = factory(key);
        this.set(key, value);
        return value;
    }

    delete(key: FieldIdentifier): boolean {
        const hash = key.hashCode();
        const bucket = this.buckets.get(hash);
        if (!bucket) {
            return false;
        }

        const position = bucket.findIndex((entry) => entry.key.equals(key));
        if (position === -1) {
            return false;
        }

        const [removed] = bucket.splice(position, 1);
        if (bucket.length === 0) {
            this.buckets.delete(hash);
        }
        if (removed) {
            this.order.delete(removed);
        }
        return true;
    }

    clear(): void {
        this.buckets.clear();
        this.order.clear();
    }

    *keys(): IterableIterator<FieldIdentifier> {
        for (const entry of this.order) {
            yield entry.key;
        }
    }

    *values(): IterableIterator<V> {
        for (const entry of this.order) {
            yield entry.value;
        }
    }

    *entries(): IterableIterator<[FieldIdentifier, V]> {
        for (const entry of this.order) {
            yield [entry.key, entry.value];
        }
    }

    /**
     * Keys whose model is `model`, in insertion order.
     */
    keysForModel(model: object): FieldIdentifier[] {
        const result: FieldIdentifier[] = [];
        for (const entry of this.order) {
            if (entry.key.model === model) {
                result.push(entry.key);
            }
        }
        return result;
    }

    forEach(callback: (value: V, key: FieldIdentifier, map: this) => void): void {
        for (const entry of this.order) {
            callback(entry.value, entry.key, this);
        }
    }

    [Symbol.iterator](): IterableIterator<[FieldIdentifier, V]> {
        return this.entries();
    }

    private find(key: FieldIdentifier): Entry<V> | undefined {
        return this.buckets.get(key.hashCode())?.find((entry) => entry.key.equals(key));
    }
}
