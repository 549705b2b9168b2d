/**
 * Splits text into one fragment per word. Every fragment but the last keeps the
 * whitespace that follows it, so joining the fragments gives back the text.
 */
export function splitWords(text: string): string[] {
  return text.match(/\S+\s*/g) ?? [];
}

/**
 * Splits text into fragments of roughly `minChunk`–`maxChunk` characters,
 * cutting after a space where one is available. Joining the fragments gives
 * back the text.
 */
export function chunkText(text: string, minChunk = 30, maxChunk = 80): string[] {
  if (!text.trim()) {
    return [];
  }

  const lower = Math.max(1, Math.min(minChunk, maxChunk));
  const upper = Math.max(lower, maxChunk);
  const chunks: string[] = [];
  let cursor = 0;

  while (cursor < text.length) {
    let end = Math.min(text.length, cursor + upper);
    if (end < text.length) {
      const breakpoint = text.lastIndexOf(" ", end - 1);
      if (breakpoint >= cursor + lower - 1) {
        end = breakpoint + 1;
      }
    }

    chunks.push(text.slice(cursor, end));
    cursor = end;
  }

  return chunks;
}

export async function* streamFromChunks(
  chunks: readonly string[],
  signal?: AbortSignal,
): AsyncGenerator<string> {
  for (const chunk of chunks) {
    if (signal?.aborted) {
      return;
    }
    yield chunk;
  }
}
