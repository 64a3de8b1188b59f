import { IndexingService } from '../services/IndexingService';
import { FakeEmbedder, InMemoryVectorStore } from './helpers/fakes';

function words(count: number): string {
  return Array.from({ length: count }, (_, i) => `w${i}`).join(' ');
}

describe('IndexingService', () => {
  let vectorStore: InMemoryVectorStore;
  let embedder: FakeEmbedder;
  let indexingService: IndexingService;
  const config = { chunkSize: 4, chunkOverlap: 1 };

  beforeEach(() => {
    vectorStore = new InMemoryVectorStore();
    embedder = new FakeEmbedder();
    indexingService = new IndexingService(embedder, vectorStore);
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should store every chunk under the material id with its metadata', async () => {
    const result = await indexingService.indexDeclaration(
      {
        text: words(10),
        materialId: 'MAT-1',
        sourceDocumentId: 'acme.pdf',
        sku: 'SKU-9',
        metadata: { supplier: 'Acme Corp', component: 'Tray' }
      },
      config
    );

    expect(result).toEqual({ chunksCreated: 4, totalChunks: 4, collectionName: 'test-collection' });
    expect([...vectorStore.vectors.keys()]).toEqual([
      'mat-1_chunk_0',
      'mat-1_chunk_1',
      'mat-1_chunk_2',
      'mat-1_chunk_3'
    ]);

    const [first] = await vectorStore.get({ materialId: 'mat-1' });
    expect(first.text).toBe('w0 w1 w2 w3');
    expect(first.sourceDocumentId).toBe('acme.pdf');
    expect(first.metadata).toMatchObject({
      supplier: 'Acme Corp',
      component: 'Tray',
      sku: 'SKU-9',
      chunk_overlap: '1'
    });
  });

  it('should remove chunks left over from a longer earlier version', async () => {
    await indexingService.indexDeclaration({ text: words(10), materialId: 'MAT-1', sourceDocumentId: 'v1.pdf' }, config);
    const result = await indexingService.indexDeclaration({ text: words(5), materialId: 'MAT-1', sourceDocumentId: 'v2.pdf' }, config);

    expect(result.totalChunks).toBe(2);
    expect(vectorStore.deletedIds).toEqual(['mat-1_chunk_2', 'mat-1_chunk_3']);

    const chunks = await vectorStore.get({ materialId: 'mat-1' });
    expect(chunks.map(chunk => chunk.text)).toEqual(['w0 w1 w2 w3', 'w3 w4']);
    expect(chunks.every(chunk => chunk.sourceDocumentId === 'v2.pdf')).toBe(true);
  });

  it('should not touch other materials when removing stale chunks', async () => {
    await indexingService.indexDeclaration({ text: words(10), materialId: 'MAT-10', sourceDocumentId: 'a.pdf' }, config);
    await indexingService.indexDeclaration({ text: words(2), materialId: 'MAT-1', sourceDocumentId: 'b.pdf' }, config);

    expect(vectorStore.deletedIds).toEqual([]);
    expect(await vectorStore.get({ materialId: 'mat-10' })).toHaveLength(4);
  });

  it('should share one scope between ids that differ only in case', async () => {
    await indexingService.indexDeclaration({ text: words(10), materialId: 'MAT-1', sourceDocumentId: 'v1.pdf' }, config);
    await indexingService.indexDeclaration({ text: words(5), materialId: ' mat-1 ', sourceDocumentId: 'v2.pdf' }, config);

    expect([...vectorStore.vectors.keys()]).toEqual(['mat-1_chunk_0', 'mat-1_chunk_1']);
    const chunks = await vectorStore.get({ materialId: 'mat-1' });
    expect(chunks.map(chunk => chunk.materialId)).toEqual(['mat-1', 'mat-1']);
  });

  it('should skip chunks whose embedding fails', async () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    embedder.failWhen = text => text.startsWith('w3');

    const result = await indexingService.indexDeclaration(
      { text: words(10), materialId: 'MAT-1', sourceDocumentId: 'acme.pdf' },
      config
    );

    expect(result).toEqual({ chunksCreated: 3, totalChunks: 4, collectionName: 'test-collection' });
    expect(vectorStore.vectors.has('mat-1_chunk_1')).toBe(false);
  });

  it('should drop the earlier version of a chunk whose new embedding fails', async () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const letters = (prefix: string) => Array.from({ length: 10 }, (_, i) => `${prefix}${i}`).join(' ');
    await indexingService.indexDeclaration({ text: letters('a'), materialId: 'MAT-1', sourceDocumentId: 'v1.pdf' }, config);

    embedder.failWhen = text => text.startsWith('b3');
    const result = await indexingService.indexDeclaration(
      { text: letters('b'), materialId: 'MAT-1', sourceDocumentId: 'v2.pdf' },
      config
    );

    expect(result).toEqual({ chunksCreated: 3, totalChunks: 4, collectionName: 'test-collection' });
    expect(vectorStore.deletedIds).toEqual(['mat-1_chunk_1']);

    const chunks = await vectorStore.get({ materialId: 'mat-1' });
    expect(chunks.map(chunk => chunk.text)).toEqual(['b0 b1 b2 b3', 'b6 b7 b8 b9', 'b9']);
    expect(chunks.every(chunk => chunk.sourceDocumentId === 'v2.pdf')).toBe(true);
  });

  it('should clean page numbering before chunking', async () => {
    await indexingService.indexDeclaration(
      { text: 'Declaration of conformity\nPage 1 of 2\nLead below limits', materialId: 'MAT-1', sourceDocumentId: 'acme.pdf' },
      { chunkSize: 300, chunkOverlap: 50 }
    );

    const [chunk] = await vectorStore.get({ materialId: 'mat-1' });
    expect(chunk.text).toBe('Declaration of conformity\n\nLead below limits');
  });

  it('should index nothing for blank text', async () => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    const result = await indexingService.indexDeclaration({ text: '   ', materialId: 'MAT-1', sourceDocumentId: 'blank.pdf' }, config);

    expect(result).toEqual({ chunksCreated: 0, totalChunks: 0, collectionName: 'test-collection' });
    expect(embedder.calls).toEqual([]);
  });
});
