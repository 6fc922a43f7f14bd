import { Queue, Worker, type ConnectionOptions, type Job } from 'bullmq';

import { config } from '@config/env.config.js';
import type { InboundMessage } from '@services/conversation/state.types.js';
import { errorMeta, logger } from '@utils/logger.js';

import { MessageProcessor } from './message.processor.js';

const QUEUE_NAME = 'messages';

let queue: Queue<InboundMessage> | undefined;
let worker: Worker<InboundMessage> | undefined;
let inlineProcessor: MessageProcessor | undefined;

export function connectionFromUrl(url: string): ConnectionOptions {
  const u = new URL(url);
  return {
    host: u.hostname,
    port: u.port ? Number(u.port) : 6379,
    username: u.username || undefined,
    password: u.password ? decodeURIComponent(u.password) : undefined,
    db: u.pathname.length > 1 ? Number(u.pathname.slice(1)) : undefined,
    tls: u.protocol === 'rediss:' ? {} : undefined,
    maxRetriesPerRequest: null,
  };
}

export function startQueue(): void {
  if (queue && worker) return;
  if (!config.REDIS_URL) throw new Error('REDIS_URL is required to start the queue');

  const connection = connectionFromUrl(config.REDIS_URL);
  const processor = new MessageProcessor();
  queue = new Queue<InboundMessage>(QUEUE_NAME, { connection });
  worker = new Worker<InboundMessage>(
    QUEUE_NAME,
    async (job: Job<InboundMessage>) => {
      await processor.processMessage(job.data);
    },
    { connection, concurrency: config.QUEUE_CONCURRENCY },
  );

  worker.on('failed', (job, err) => {
    logger.error('[queue] job failed', { jobId: job?.id, ...errorMeta(err) });
  });
}

export async function stopQueue(): Promise<void> {
  await worker?.close();
  await queue?.close();
  worker = undefined;
  queue = undefined;
}

export async function enqueue(data: InboundMessage): Promise<void> {
  if (!queue) throw new Error('Queue not started');
  // A turn must run once: delivery retries happen inside the processor.
  await queue.add('message', data, {
    jobId: data.messageId,
    removeOnComplete: true,
    removeOnFail: 50,
    attempts: 1,
  });
}

/** Routes an inbound message to the queue, or processes it in this process. */
export async function dispatchInbound(data: InboundMessage): Promise<void> {
  if (config.QUEUE_ENABLED) {
    await enqueue(data);
    return;
  }
  inlineProcessor ??= new MessageProcessor();
  await inlineProcessor.processMessage(data);
}
