import Bull from 'bull';
import type { DocumentType, IndexQueue, NormalizedDocument } from '../../contracts/types.js';
import { createChildLogger, type Logger } from '../../utils/logger.js';

/**
 * JSON form of a NormalizedDocument as stored in a Bull job
 */
export interface SerializedDocument {
  id: string;
  dataSourceId: string;
  type: DocumentType;
  title: string;
  content: string | null;
  author: string;
  authorImageUrl: string | null;
  location: string;
  url: string;
  /** ISO 8601 */
  timestamp: string;
  children: SerializedDocument[];
}

export interface IndexDocumentJobData {
  document: SerializedDocument;
}

export function serializeDocument(document: NormalizedDocument): SerializedDocument {
  return {
    ...document,
    timestamp: document.timestamp.toISOString(),
    children: document.children.map(serializeDocument),
  };
}

/**
 * Job id shared by every enqueue of the same document, so Bull drops duplicates
 */
export function documentJobId(document: Pick<NormalizedDocument, 'dataSourceId' | 'id'>): string {
  return `${document.dataSourceId}:${document.id}`;
}

/**
 * Queue surface used by BullIndexQueue
 */
export type IndexJobQueue = Pick<Bull.Queue<IndexDocumentJobData>, 'add' | 'close' | 'name'>;

export interface BullIndexQueueConfig {
  queueName: string;
  redis: {
    host: string;
    port: number;
    password?: string;
  };
  defaultJobOptions?: Bull.JobOptions;
}

/**
 * IndexQueue backed by a Bull queue: one job per top-level document
 */
export class BullIndexQueue implements IndexQueue {
  private readonly logger: Logger;

  constructor(private readonly queue: IndexJobQueue, logger?: Logger) {
    this.logger = logger ?? createChildLogger({ component: 'BullIndexQueue', queue: queue.name });
  }

  /**
   * Create default job options for the index queue
   */
  static createDefaultJobOptions(): Bull.JobOptions {
    return {
      attempts: 3,
      backoff: {
        type: 'exponential',
        delay: 2000, // Start with 2 seconds
      },
      removeOnComplete: {
        age: 24 * 3600, // Keep completed jobs for 24 hours
        count: 1000, // Keep last 1000 completed jobs
      },
      removeOnFail: {
        age: 7 * 24 * 3600, // Keep failed jobs for 7 days
      },
    };
  }

  static create(config: BullIndexQueueConfig, logger?: Logger): BullIndexQueue {
    const queue = new Bull<IndexDocumentJobData>(config.queueName, {
      redis: config.redis,
      defaultJobOptions: config.defaultJobOptions ?? BullIndexQueue.createDefaultJobOptions(),
    });
    return new BullIndexQueue(queue, logger);
  }

  async enqueue(document: NormalizedDocument): Promise<void> {
    const jobId = documentJobId(document);
    await this.queue.add({ document: serializeDocument(document) }, { jobId });
    this.logger.debug({ jobId, childCount: document.children.length }, 'Enqueued document for indexing');
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}

/**
 * IndexQueue that keeps documents in memory, in enqueue order
 */
export class InMemoryIndexQueue implements IndexQueue {
  private readonly items: NormalizedDocument[] = [];

  async enqueue(document: NormalizedDocument): Promise<void> {
    this.items.push(document);
  }

  get documents(): readonly NormalizedDocument[] {
    return this.items;
  }

  get size(): number {
    return this.items.length;
  }
}
