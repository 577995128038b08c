import { InvalidTransitionError, NotFoundError } from '../../pipeline/src/common/errors/pipeline.errors';
import { documentIdFor } from '../../pipeline/src/modules/documents/document-id';
import {
  chunkId,
  DocumentState,
  documentIdOfChunk,
} from '../../pipeline/src/modules/documents/document.types';
import { InMemoryDocumentStore } from '../../pipeline/src/modules/documents/services/in-memory-document.store';

describe('InMemoryDocumentStore', () => {
  const payload = Buffer.from('Paris is the capital of France.');
  let clock: number;
  let store: InMemoryDocumentStore;

  beforeEach(() => {
    clock = Date.parse('2024-03-01T10:00:00.000Z');
    store = new InMemoryDocumentStore(() => new Date(clock));
  });

  it('creates a pending document keyed by the payload hash', async () => {
    const id = await store.create(payload, { contentType: 'text/plain', fileName: 'capitals.txt' });

    expect(id).toBe(documentIdFor(payload));
    expect(id).toMatch(/^[0-9a-f]{64}$/);
    expect(await store.get(id)).toEqual({
      id,
      payloadRef: `memory:${id}`,
      contentType: 'text/plain',
      fileName: 'capitals.txt',
      state: DocumentState.Pending,
      chunkCount: 0,
      attempts: 0,
      createdAt: '2024-03-01T10:00:00.000Z',
      updatedAt: '2024-03-01T10:00:00.000Z',
    });
    expect((await store.getPayload(id)).toString()).toBe('Paris is the capital of France.');
  });

  it('returns the existing record when the same bytes are uploaded again', async () => {
    const first = await store.create(payload, { contentType: 'text/plain' });
    await store.setState(first, DocumentState.Processing);

    const second = await store.create(Buffer.from(payload), { contentType: 'text/markdown' });

    expect(second).toBe(first);
    const record = await store.get(first);
    expect(record.state).toBe(DocumentState.Processing);
    expect(record.contentType).toBe('text/plain');
  });

  it('walks the lifecycle and counts attempts', async () => {
    const id = await store.create(payload, { contentType: 'text/plain' });

    clock += 1000;
    const processing = await store.setState(id, DocumentState.Processing);
    expect(processing.attempts).toBe(1);
    expect(processing.updatedAt).toBe('2024-03-01T10:00:01.000Z');

    const failed = await store.setState(id, DocumentState.Failed, { error: 'embedding backend down' });
    expect(failed.error).toBe('embedding backend down');

    const retried = await store.setState(id, DocumentState.Processing);
    expect(retried.attempts).toBe(2);
    expect(retried.error).toBeUndefined();

    const ready = await store.setState(id, DocumentState.Ready, { chunkCount: 3 });
    expect(ready).toMatchObject({ state: DocumentState.Ready, chunkCount: 3, attempts: 2 });
  });

  it('rejects moves outside the lifecycle graph and leaves the record alone', async () => {
    const id = await store.create(payload, { contentType: 'text/plain' });

    await expect(store.setState(id, DocumentState.Ready)).rejects.toBeInstanceOf(InvalidTransitionError);
    await expect(store.setState(id, DocumentState.Ready)).rejects.toThrow(
      `Document ${id} cannot move from pending to ready`,
    );
    expect((await store.get(id)).state).toBe(DocumentState.Pending);

    await store.setState(id, DocumentState.Processing);
    await store.setState(id, DocumentState.Ready);
    await expect(store.setState(id, DocumentState.Processing)).rejects.toBeInstanceOf(InvalidTransitionError);
  });

  it('reports unknown ids as NotFoundError', async () => {
    await expect(store.get('missing')).rejects.toBeInstanceOf(NotFoundError);
    await expect(store.setState('missing', DocumentState.Processing)).rejects.toThrow('Document missing not found');
    await expect(store.getPayload('missing')).rejects.toBeInstanceOf(NotFoundError);
    await expect(store.delete('missing')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('stores chunks idempotently and looks them up by id', async () => {
    const id = await store.create(payload, { contentType: 'text/plain' });
    const chunks = [
      { id: chunkId(id, 0), documentId: id, ordinal: 0, text: 'Paris is' },
      { id: chunkId(id, 1), documentId: id, ordinal: 1, text: 'the capital of France.' },
    ];

    await store.putChunks(id, chunks);
    await store.putChunks(id, chunks);

    expect(await store.listChunks(id)).toEqual(chunks);
    expect(await store.getChunks([chunkId(id, 1), `${id}:7`, 'other:0', chunkId(id, 0)])).toEqual([
      chunks[1],
      chunks[0],
    ]);
  });

  it('deletes the record, payload and chunks', async () => {
    const id = await store.create(payload, { contentType: 'text/plain' });
    await store.putChunks(id, [{ id: chunkId(id, 0), documentId: id, ordinal: 0, text: 'Paris' }]);

    expect(await store.delete(id)).toEqual([chunkId(id, 0)]);
    await expect(store.get(id)).rejects.toBeInstanceOf(NotFoundError);
    expect(await store.getChunks([chunkId(id, 0)])).toEqual([]);
  });

  it('splits chunk ids back into their document id', () => {
    expect(chunkId('abc', 4)).toBe('abc:4');
    expect(documentIdOfChunk('abc:4')).toBe('abc');
    expect(documentIdOfChunk('abc')).toBe('abc');
  });
});
