/**
 * Domain service that slices the filtered work list into fixed-size chunks.
 *
 * Pure logic, no I/O. The final chunk may be shorter than `chunkSize`.
 */
export class ChunkSplitter {
  constructor(private readonly chunkSize: number) {
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new Error('Chunk size must be a positive integer');
    }
  }

  split<T>(items: readonly T[]): Array<readonly T[]> {
    const chunks: Array<readonly T[]> = [];
    for (let start = 0; start < items.length; start += this.chunkSize) {
      chunks.push(items.slice(start, start + this.chunkSize));
    }
    return chunks;
  }
}
