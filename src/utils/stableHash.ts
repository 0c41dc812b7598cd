// src/utils/stableHash.ts

import crypto from "crypto";

/**
 * MD5 of the UTF-8 input, truncated to its first 32 bits as an unsigned integer.
 * Used only for reproducible table selection, never for security.
 */
export function stableHash32(value: string): number {
    const digest = crypto.createHash("md5").update(value, "utf8").digest("hex");
    return parseInt(digest.slice(0, 8), 16) >>> 0;
}

/**
 * Reduces a 32-bit hash into one index per table, shifting by `stride` bits between
 * tables so the picks stay independent of each other.
 */
export function pickIndices(hash: number, tableSizes: readonly number[], stride = 3): number[] {
    return tableSizes.map((size, position) => (hash >>> (position * stride)) % size);
}
