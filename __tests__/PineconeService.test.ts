import { PineconeService, chunkId } from '../services/PineconeService';
import { ChunkMetadata } from '../types';

const mockIndex = {
  upsert: jest.fn(),
  query: jest.fn(),
  fetch: jest.fn(),
  listPaginated: jest.fn(),
  deleteMany: jest.fn()
};

jest.mock('@pinecone-database/pinecone', () => ({
  Pinecone: jest.fn().mockImplementation(() => ({
    index: jest.fn(() => mockIndex)
  }))
}));

function metadata(materialId: string, index: number, text: string): ChunkMetadata {
  return {
    material_id: materialId,
    sku: 'SKU-1',
    source_document_id: 'acme.pdf',
    chunk_index: index,
    total_chunks: 3,
    chunk_overlap: 50,
    text,
    uploaded_at: '2024-01-01T00:00:00.000Z'
  };
}

describe('PineconeService', () => {
  let pineconeService: PineconeService;

  beforeEach(() => {
    jest.clearAllMocks();
    pineconeService = new PineconeService('test-key', 'test-index', 3);
  });

  it('should build chunk ids from the material id', () => {
    expect(chunkId('MAT-1', 4)).toBe('MAT-1_chunk_4');
  });

  describe('upsert', () => {
    it('should send records in batches with the chunk text in metadata', async () => {
      const count = 120;
      const ids = Array.from({ length: count }, (_, i) => chunkId('MAT-1', i));
      const embeddings = ids.map(() => [0.1, 0.2, 0.3]);
      const documents = ids.map((_, i) => `chunk ${i}`);
      const metadatas = ids.map((_, i) => metadata('MAT-1', i, `chunk ${i}`));

      await pineconeService.upsert(ids, embeddings, documents, metadatas);

      expect(mockIndex.upsert).toHaveBeenCalledTimes(3);
      expect(mockIndex.upsert.mock.calls.map(call => call[0].length)).toEqual([50, 50, 20]);
      expect(mockIndex.upsert.mock.calls[0][0][0]).toEqual({
        id: 'MAT-1_chunk_0',
        values: [0.1, 0.2, 0.3],
        metadata: metadata('MAT-1', 0, 'chunk 0')
      });
    });

    it('should reject arrays of different lengths', async () => {
      await expect(pineconeService.upsert(['a', 'b'], [[1, 2, 3]], ['x', 'y'], [metadata('MAT-1', 0, 'x')]))
        .rejects.toThrow('Upsert arrays differ in length: ids=2, embeddings=1, documents=2, metadatas=1');
      expect(mockIndex.upsert).not.toHaveBeenCalled();
    });

    it('should wrap SDK failures', async () => {
      const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      mockIndex.upsert.mockRejectedValueOnce(new Error('index not found'));

      await expect(pineconeService.upsert(['a'], [[1, 2, 3]], ['x'], [metadata('MAT-1', 0, 'x')]))
        .rejects.toThrow('Failed to upsert vectors to Pinecone: index not found');

      error.mockRestore();
    });
  });

  describe('query', () => {
    it('should filter by material and convert scores to distances', async () => {
      mockIndex.query.mockResolvedValueOnce({
        matches: [
          { id: 'MAT-1_chunk_0', score: 0.9, metadata: metadata('MAT-1', 0, 'Complies with 94/62/EC.') },
          { id: 'orphan', score: 0.8 }
        ]
      });

      const results = await pineconeService.query([0.1, 0.2, 0.3], 3, { materialId: 'MAT-1' });

      expect(mockIndex.query).toHaveBeenCalledWith({
        vector: [0.1, 0.2, 0.3],
        topK: 3,
        includeMetadata: true,
        filter: { material_id: { $eq: 'MAT-1' } }
      });
      expect(results).toHaveLength(1);
      expect(results[0].distance).toBeCloseTo(0.1);
      expect(results[0].chunk).toEqual({
        text: 'Complies with 94/62/EC.',
        sourceDocumentId: 'acme.pdf',
        sequenceIndex: 0,
        totalChunks: 3,
        materialId: 'MAT-1',
        metadata: { sku: 'SKU-1', chunk_overlap: '50', uploaded_at: '2024-01-01T00:00:00.000Z' }
      });
    });
  });

  describe('get', () => {
    it('should list ids by prefix across pages and return chunks in order', async () => {
      mockIndex.listPaginated
        .mockResolvedValueOnce({ vectors: [{ id: 'MAT-1_chunk_1' }, { id: 'MAT-1_chunk_0' }], pagination: { next: 'page-2' } })
        .mockResolvedValueOnce({ vectors: [{ id: 'MAT-1_chunk_2' }] });
      mockIndex.fetch
        .mockResolvedValueOnce({
          records: {
            'MAT-1_chunk_1': { id: 'MAT-1_chunk_1', values: [], metadata: metadata('MAT-1', 1, 'second') },
            'MAT-1_chunk_0': { id: 'MAT-1_chunk_0', values: [], metadata: metadata('MAT-1', 0, 'first') },
            'MAT-1_chunk_2': { id: 'MAT-1_chunk_2', values: [], metadata: metadata('MAT-1', 2, 'third') }
          }
        });

      const chunks = await pineconeService.get({ materialId: 'MAT-1' });

      expect(mockIndex.listPaginated).toHaveBeenNthCalledWith(1, { prefix: 'MAT-1_chunk_', paginationToken: undefined });
      expect(mockIndex.listPaginated).toHaveBeenNthCalledWith(2, { prefix: 'MAT-1_chunk_', paginationToken: 'page-2' });
      expect(mockIndex.fetch).toHaveBeenCalledWith(['MAT-1_chunk_1', 'MAT-1_chunk_0', 'MAT-1_chunk_2']);
      expect(chunks.map(chunk => chunk.text)).toEqual(['first', 'second', 'third']);
    });

    it('should drop fetched chunks that do not match the filter', async () => {
      mockIndex.listPaginated.mockResolvedValueOnce({ vectors: [{ id: 'MAT-1_chunk_0' }] });
      mockIndex.fetch.mockResolvedValueOnce({
        records: {
          'MAT-1_chunk_0': { id: 'MAT-1_chunk_0', values: [], metadata: metadata('MAT-1', 0, 'first') }
        }
      });

      expect(await pineconeService.get({ materialId: 'MAT-1', sourceDocumentId: 'other.pdf' })).toEqual([]);
    });
  });

  describe('delete', () => {
    it('should delete the given ids', async () => {
      await pineconeService.delete(['MAT-1_chunk_3', 'MAT-1_chunk_4']);
      expect(mockIndex.deleteMany).toHaveBeenCalledWith(['MAT-1_chunk_3', 'MAT-1_chunk_4']);
    });
  });
});
