export const MAX_CHUNK_LENGTH = 1000;

/**
 * Splits text into chunks of at most `maxLength` characters, breaking at
 * whitespace. A single word longer than `maxLength` is cut into pieces.
 */
export const splitTextIntoChunks = (text: string, maxLength = MAX_CHUNK_LENGTH): string[] => {
  const chunks: string[] = [];
  let current = '';

  const flush = () => {
    if (current) chunks.push(current);
    current = '';
  };

  for (const word of text.split(/\s+/).filter(Boolean)) {
    if (word.length > maxLength) {
      flush();
      for (let i = 0; i < word.length; i += maxLength) {
        chunks.push(word.slice(i, i + maxLength));
      }
      continue;
    }

    const candidate = current ? `${current} ${word}` : word;
    if (candidate.length > maxLength) {
      flush();
      current = word;
    } else {
      current = candidate;
    }
  }
  flush();

  return chunks;
};
