/**
 * Content hashing for batch audit records.
 *
 * ARCHITECTURAL NOTE: Uses js-sha256 so core stays free of Node built-ins.
 */

import { sha256 } from 'js-sha256';
import { BATCH_ID } from '../types/index.js';

/**
 * SHA-256 of raw file bytes, prefixed with 'sha256:'.
 */
export function hashContent(data: ArrayBuffer | Uint8Array): string {
    const bytes = data instanceof Uint8Array ? data : new Uint8Array(data);
    return `sha256:${sha256(bytes)}`;
}

/**
 * Deterministic batch id.
 *
 * Payload format: "{file_hash}|{filename}|{started_at}"
 * Re-importing the same file at another time yields a different id.
 */
export function generateBatchId(fileHash: string, filename: string, startedAt: string): string {
    return sha256(`${fileHash}|${filename}|${startedAt}`).slice(0, BATCH_ID.LENGTH);
}
