import {
  BullIndexQueue,
  InMemoryIndexQueue,
  documentJobId,
  serializeDocument,
} from '../IndexQueue.js';
import type { NormalizedDocument } from '../../../contracts/types.js';

function createDocument(): NormalizedDocument {
  const comment: NormalizedDocument = {
    id: '99',
    dataSourceId: 'basecamp-test',
    type: 'COMMENT',
    title: 'Al',
    content: 'ok',
    author: 'Al',
    authorImageUrl: null,
    location: 'Acme',
    url: 'https://x/10#comment_99',
    timestamp: new Date(Date.UTC(2023, 0, 2, 3, 5)),
    children: [],
  };
  return {
    id: '10',
    dataSourceId: 'basecamp-test',
    type: 'DOCUMENT',
    title: 'Bo',
    content: 'Hi',
    author: 'Bo',
    authorImageUrl: 'https://avatars.test/bo.png',
    location: 'Acme',
    url: 'https://x/10',
    timestamp: new Date(Date.UTC(2023, 0, 2, 3, 4, 5)),
    children: [comment],
  };
}

describe('serializeDocument', () => {
  it('writes every timestamp in the tree as ISO 8601', () => {
    const serialized = serializeDocument(createDocument());

    expect(serialized.timestamp).toBe('2023-01-02T03:04:05.000Z');
    expect(serialized.children[0].timestamp).toBe('2023-01-02T03:05:00.000Z');
    expect(serialized.children[0].url).toBe('https://x/10#comment_99');
  });
});

describe('documentJobId', () => {
  it('combines the data source and the document id', () => {
    expect(documentJobId({ dataSourceId: 'basecamp-test', id: '10' })).toBe('basecamp-test:10');
  });
});

describe('BullIndexQueue', () => {
  it('adds one job per document keyed by data source and id', async () => {
    const add = jest.fn().mockResolvedValue(undefined);
    const close = jest.fn().mockResolvedValue(undefined);
    const queue = new BullIndexQueue({ name: 'index-documents', add, close });
    const document = createDocument();

    await queue.enqueue(document);

    expect(add).toHaveBeenCalledTimes(1);
    expect(add).toHaveBeenCalledWith({ document: serializeDocument(document) }, { jobId: 'basecamp-test:10' });
  });

  it('propagates a failed add', async () => {
    const add = jest.fn().mockRejectedValue(new Error('redis down'));
    const queue = new BullIndexQueue({ name: 'index-documents', add, close: jest.fn() });

    await expect(queue.enqueue(createDocument())).rejects.toThrow('redis down');
  });

  it('closes the underlying queue', async () => {
    const close = jest.fn().mockResolvedValue(undefined);
    const queue = new BullIndexQueue({ name: 'index-documents', add: jest.fn(), close });

    await queue.close();

    expect(close).toHaveBeenCalledTimes(1);
  });

  it('retries failed jobs with exponential backoff by default', () => {
    expect(BullIndexQueue.createDefaultJobOptions()).toMatchObject({
      attempts: 3,
      backoff: { type: 'exponential', delay: 2000 },
    });
  });
});

describe('InMemoryIndexQueue', () => {
  it('keeps documents in enqueue order', async () => {
    const queue = new InMemoryIndexQueue();
    const first = createDocument();
    const second = { ...createDocument(), id: '11' };

    await Promise.all([queue.enqueue(first), queue.enqueue(second)]);

    expect(queue.size).toBe(2);
    expect(queue.documents.map((document) => document.id)).toEqual(['10', '11']);
  });
});
