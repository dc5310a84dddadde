import { createHash } from 'node:crypto';

/**
 * Calculates SHA-256 checksum of text content (hex).
 */
export function calculateChecksum(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}
