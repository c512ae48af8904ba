/**
 * @module hash-table
 * @description
 * Separate-chaining hash table keyed by integer ids.
 *
 * Buckets are small arrays of `[key, value]` pairs. Once the number of stored pairs exceeds
 * `bucketCount * loadFactor`, the bucket array doubles and every pair is rehashed, so
 * insertion is O(1) amortized over the table's lifetime. Lookup, removal and membership
 * are O(1) on average.
 *
 * Iteration walks the buckets in index order and each bucket in insertion order. Callers
 * that route over the keys rely on this order being deterministic for a given history.
 */

import { SIMULATION_ERRORS, SimulationError } from '../errors';

type Entry<V> = [key: number, value: V];

export const DEFAULT_BUCKET_COUNT = 16;
export const DEFAULT_LOAD_FACTOR = 0.75;

export class HashTable<V> implements Iterable<Entry<V>> {
    private buckets: Entry<V>[][];
    private size = 0;
    private readonly initialBucketCount: number;

    constructor(
        bucketCount: number = DEFAULT_BUCKET_COUNT,
        readonly loadFactor: number = DEFAULT_LOAD_FACTOR,
    ) {
        if (!Number.isInteger(bucketCount) || bucketCount < 1) {
            throw new RangeError(`Bucket count must be a positive integer, got ${bucketCount}`);
        }
        if (!(loadFactor > 0)) {
            throw new RangeError(`Load factor must be positive, got ${loadFactor}`);
        }
        this.initialBucketCount = bucketCount;
        this.buckets = HashTable.allocate(bucketCount);
    }

    static from<V>(entries: Iterable<Entry<V>>): HashTable<V> {
        const table = new HashTable<V>();
        for (const [key, value] of entries) {
            table.put(key, value);
        }
        return table;
    }

    get length(): number {
        return this.size;
    }

    get bucketCount(): number {
        return this.buckets.length;
    }

    put(key: number, value: V): void {
        const bucket = this.bucketFor(key);
        const existing = bucket.find(entry => entry[0] === key);

        if (existing) {
            existing[1] = value;
            return;
        }

        bucket.push([key, value]);
        ++this.size;

        if (this.size > this.buckets.length * this.loadFactor) {
            this.resize(this.buckets.length * 2);
        }
    }

    /** @throws {SimulationError} `KEY_NOT_FOUND` when the key is absent */
    get(key: number): V {
        const entry = this.bucketFor(key).find(entry => entry[0] === key);
        if (!entry) {
            throw new SimulationError(SIMULATION_ERRORS.KEY_NOT_FOUND, `Key ${key} not found`);
        }
        return entry[1];
    }

    find(key: number): V | undefined {
        return this.bucketFor(key).find(entry => entry[0] === key)?.[1];
    }

    contains(key: number): boolean {
        return this.bucketFor(key).some(entry => entry[0] === key);
    }

    remove(key: number): void {
        this.pop(key);
    }

    pop(key: number): V | undefined {
        const bucket = this.bucketFor(key);
        const index = bucket.findIndex(entry => entry[0] === key);
        if (index === -1) {
            return undefined;
        }

        --this.size;
        return bucket.splice(index, 1)[0][1];
    }

    clear(): void {
        this.buckets = HashTable.allocate(this.initialBucketCount);
        this.size = 0;
    }

    *entries(): IterableIterator<Entry<V>> {
        for (const bucket of this.buckets) {
            for (const entry of bucket) {
                yield entry;
            }
        }
    }

    *keys(): IterableIterator<number> {
        for (const [key] of this.entries()) {
            yield key;
        }
    }

    *values(): IterableIterator<V> {
        for (const [, value] of this.entries()) {
            yield value;
        }
    }

    [Symbol.iterator](): IterableIterator<Entry<V>> {
        return this.entries();
    }

    private bucketFor(key: number): Entry<V>[] {
        if (!Number.isSafeInteger(key)) {
            throw new SimulationError(SIMULATION_ERRORS.INVALID_KEY, `Key must be a safe integer, got ${key}`);
        }

        const n = this.buckets.length;
        return this.buckets[((key % n) + n) % n];
    }

    private resize(bucketCount: number): void {
        const previous = this.buckets;
        this.buckets = HashTable.allocate(bucketCount);

        for (const bucket of previous) {
            for (const [key, value] of bucket) {
                this.bucketFor(key).push([key, value]);
            }
        }
    }

    private static allocate<V>(bucketCount: number): Entry<V>[][] {
        return Array.from({ length: bucketCount }, () => []);
    }
}
