import { logger } from '../logger.js';

/** Telegram's limit for a single text message */
export const TELEGRAM_MESSAGE_LIMIT = 4096;

const BLOCK_SEPARATOR = '\n\n';

/**
 * Cut a block at its last line break inside the limit. Without one, cut at
 * the limit and drop the HTML markup so Telegram can still parse the rest.
 */
function truncateBlock(block: string, maxLength: number): string {
  const lineBreak = block.lastIndexOf('\n', maxLength);
  if (lineBreak > 0) {
    return block.slice(0, lineBreak);
  }

  let end = maxLength;
  const last = block.charCodeAt(end - 1);
  // high surrogate: keep the pair together
  if (last >= 0xd800 && last <= 0xdbff) {
    end--;
  }

  return block
    .slice(0, end)
    .replace(/<[^>]*$/, '')
    .replace(/&[a-z#0-9]*$/i, '')
    .replace(/<\/?[a-z]+>/gi, '');
}

/**
 * Split text into chunks no longer than maxLength, breaking only between
 * blank-line separated blocks. A single block over the limit is truncated.
 */
export function splitMessage(text: string, maxLength = TELEGRAM_MESSAGE_LIMIT): string[] {
  if (text.length <= maxLength) {
    return [text];
  }

  const chunks: string[] = [];
  let current = '';

  for (const block of text.split(BLOCK_SEPARATOR)) {
    if (!block) continue;

    const candidate = current + block + BLOCK_SEPARATOR;
    if (candidate.length <= maxLength) {
      current = candidate;
      continue;
    }

    if (current) {
      chunks.push(current.trimEnd());
      current = '';
    }

    if (block.length > maxLength) {
      logger.warn({ length: block.length, maxLength }, 'message block exceeds limit, truncating');
      chunks.push(truncateBlock(block, maxLength));
    } else {
      current = block + BLOCK_SEPARATOR;
    }
  }

  if (current.trim()) {
    chunks.push(current.trimEnd());
  }

  logger.debug({ parts: chunks.length }, 'split message');
  return chunks;
}
