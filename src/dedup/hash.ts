import { createHash } from 'node:crypto';

/**
 * Digest used for duplicate detection.
 * Text is trimmed, lower-cased and has runs of whitespace collapsed, so
 * trivially reformatted cross-posts hash the same.
 */
export function hashMessage(
  text: string,
  senderId: number | null,
  includeSender: boolean
): string {
  let input = text.trim().toLowerCase().replace(/\s+/g, ' ');

  if (includeSender && senderId !== null) {
    input += `_sender_${senderId}`;
  }

  return createHash('sha256').update(input, 'utf8').digest('hex');
}
