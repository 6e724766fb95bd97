/**
 * Upstream chunking for file content.
 *
 * Sentence-boundary chunking with a character budget. Consecutive chunks
 * share trailing sentences up to `chunkOverlap` characters; a sentence longer
 * than the budget is cut into fixed windows.
 */

export interface ChunkingOptions {
  /** Maximum characters per chunk */
  chunkSize: number;
  /** Characters of trailing context repeated at the start of the next chunk */
  chunkOverlap: number;
}

export interface Chunk {
  content: string;
  /** 0-based index */
  index: number;
}

function splitSentences(text: string): string[] {
  const sentences: string[] = [];
  const sentenceRegex = /[^.!?\n]*(?:[.!?]+|\n+)(?:\s+|$)/g;

  let match: RegExpExecArray | null;
  let lastIndex = 0;
  while ((match = sentenceRegex.exec(text)) !== null) {
    sentences.push(match[0].trim());
    lastIndex = sentenceRegex.lastIndex;
  }
  if (lastIndex < text.length) {
    sentences.push(text.slice(lastIndex).trim());
  }
  return sentences.filter((s) => s.length > 0);
}

function hardSplit(sentence: string, size: number, overlap: number): string[] {
  const step = size - overlap;
  const windows: string[] = [];
  for (let start = 0; start < sentence.length; start += step) {
    windows.push(sentence.slice(start, start + size));
    if (start + size >= sentence.length) break;
  }
  return windows;
}

function joinedLength(parts: string[]): number {
  if (parts.length === 0) return 0;
  return parts.reduce((sum, p) => sum + p.length, 0) + parts.length - 1;
}

function overlapTail(parts: string[], overlap: number): string[] {
  const tail: string[] = [];
  for (let i = parts.length - 1; i >= 0; i--) {
    if (joinedLength([parts[i], ...tail]) > overlap) break;
    tail.unshift(parts[i]);
  }
  return tail;
}

export function chunkText(text: string, options: ChunkingOptions): Chunk[] {
  const size = Math.max(1, Math.floor(options.chunkSize));
  const overlap = Math.min(Math.max(0, Math.floor(options.chunkOverlap)), size - 1);
  const trimmed = text.trim();
  if (trimmed.length === 0) return [];
  if (trimmed.length <= size) return [{ content: trimmed, index: 0 }];

  const pieces = splitSentences(trimmed).flatMap((s) =>
    s.length > size ? hardSplit(s, size, overlap) : [s],
  );

  const chunks: string[] = [];
  let current: string[] = [];
  for (const piece of pieces) {
    if (current.length > 0 && joinedLength([...current, piece]) > size) {
      chunks.push(current.join(" "));
      current = overlapTail(current, overlap);
      if (joinedLength([...current, piece]) > size) current = [];
    }
    current.push(piece);
  }
  if (current.length > 0) chunks.push(current.join(" "));

  return chunks.map((content, index) => ({ content, index }));
}
