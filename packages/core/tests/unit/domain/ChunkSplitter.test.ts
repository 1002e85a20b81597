import { describe, it, expect } from 'vitest';
import { ChunkSplitter } from '../../../src/domain/services/ChunkSplitter.js';

describe('ChunkSplitter', () => {
  it('should split into chunks of the configured size with a shorter tail', () => {
    const splitter = new ChunkSplitter(4);

    expect(splitter.split([1, 2, 3, 4, 5, 6, 7, 8, 9, 10])).toEqual([
      [1, 2, 3, 4],
      [5, 6, 7, 8],
      [9, 10],
    ]);
  });

  it('should return no chunks for an empty list', () => {
    expect(new ChunkSplitter(50).split([])).toEqual([]);
  });

  it('should reject sizes that are not positive integers', () => {
    expect(() => new ChunkSplitter(0)).toThrow('Chunk size must be a positive integer');
    expect(() => new ChunkSplitter(2.5)).toThrow('Chunk size must be a positive integer');
  });
});
