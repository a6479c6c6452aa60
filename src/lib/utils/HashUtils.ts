/**
 * Hashing primitives for identity-keyed value objects.
 */

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

// Ids live as long as the object does; the WeakMap never keeps a model alive.
const identityIds = new WeakMap<object, number>();
let nextIdentityId = 1;

/**
 * FNV-1a over the UTF-16 code units of a string, as a signed 32-bit integer.
 * Case-sensitive: 'field' and 'Field' hash differently.
 */
export function stringHash(value: string): number {
    let hash = FNV_OFFSET_BASIS;
    for (let i = 0; i < value.length; i++) {
        hash ^= value.charCodeAt(i);
        hash = Math.imul(hash, FNV_PRIME);
    }
    return hash | 0;
}

/**
 * Stable per-instance hash. Depends only on which object it is, never on
 * its contents, so mutating a model does not change its hash.
 */
export function identityHash(target: object): number {
    let id = identityIds.get(target);
    if (id === undefined) {
        id = nextIdentityId++;
        identityIds.set(target, id);
    }
    return mix(id);
}

/**
 * Combines hashes in order: hash = hash * 31 + next, wrapped to 32 bits.
 */
export function combineHashes(...hashes: number[]): number {
    let result = 17;
    for (const hash of hashes) {
        result = (Math.imul(result, 31) + hash) | 0;
    }
    return result;
}

// Spreads sequential ids over the 32-bit range (murmur3 finalizer).
function mix(value: number): number {
    let h = value | 0;
    h ^= h >>> 16;
    h = Math.imul(h, 0x85ebca6b);
    h ^= h >>> 13;
    h = Math.imul(h, 0xc2b2ae35);
    h ^= h >>> 16;
    return h | 0;
}
