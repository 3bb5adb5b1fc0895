import { createHash } from 'node:crypto';
import type { EventMetadata } from './event.js';

/** Upper bound on the canonical serialization of an event's metadata. */
export const MAX_METADATA_LENGTH = 5000;

/**
 * Deterministic JSON serialization: object keys sorted recursively,
 * array order preserved. Two documents that differ only in key order
 * serialize identically; anything else yields a different string.
 */
export function canonicalJson(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }

  if (Array.isArray(value)) {
    return '[' + value.map((v) => canonicalJson(v)).join(',') + ']';
  }

  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  return '{' + entries.map(([k, v]) => JSON.stringify(k) + ':' + canonicalJson(v)).join(',') + '}';
}

/** SHA-256 hex digest of the canonical serialization. */
export function hashMetadata(metadata: EventMetadata): string {
  return createHash('sha256').update(canonicalJson(metadata)).digest('hex');
}

/**
 * Key that identifies one logical event for duplicate detection and
 * for the admission lock.
 */
export function admissionKey(source: string, eventType: string, metadataHash: string): string {
  return `${source}:${eventType}:${metadataHash}`;
}
