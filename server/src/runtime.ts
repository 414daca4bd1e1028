import type { AppConfig } from './lib/config.js';
import { InMemoryDocumentRepository, type DocumentRepository } from './lib/document-repository.js';
import { SupabaseDocumentRepository } from './lib/document-repository-supabase.js';
import { FF_REDIS_QUEUE } from './lib/feature-flags.js';
import { createInferenceClient } from './lib/inference.js';
import logger from './lib/logger.js';
import { getRedisClient, shutdownRedis } from './lib/redis-client.js';
import { getSupabaseAdmin } from './lib/supabase.js';
import { InProcessTaskQueue, type TaskQueue } from './lib/task-queue.js';
import { RedisTaskQueue } from './lib/task-queue-redis.js';
import { DiskUploadStore, type UploadStore } from './lib/upload-store.js';
import { createDefaultCascade } from './extraction/index.js';
import { EnrichmentRunner } from './pipeline/enrichment.js';
import { MatchingPipeline } from './pipeline/matching.js';
import { PipelineOrchestrator } from './pipeline/orchestrator.js';
import { registerPipelineWorkers } from './pipeline/workers.js';

export interface Runtime {
  repository: DocumentRepository;
  queue: TaskQueue;
  uploads: UploadStore;
  orchestrator: PipelineOrchestrator;
  shutdown(): Promise<void>;
}

function createRepository(config: AppConfig): DocumentRepository {
  const client = getSupabaseAdmin(config.supabase);
  if (client) return new SupabaseDocumentRepository(client);
  logger.warn('Supabase is not configured, documents are kept in memory only');
  return new InMemoryDocumentRepository();
}

function createQueue(config: AppConfig): TaskQueue {
  if (FF_REDIS_QUEUE) {
    const redis = getRedisClient(config.redisUrl);
    if (redis) return new RedisTaskQueue(redis);
    logger.warn('FF_REDIS_QUEUE is set but REDIS_URL is missing, using the in-process queue');
  }
  return new InProcessTaskQueue();
}

/**
 * Wires storage, queue, extraction, inference and the pipelines from config,
 * and starts the queue workers.
 */
export function createRuntime(config: AppConfig): Runtime {
  const repository = createRepository(config);
  const queue = createQueue(config);
  const uploads = new DiskUploadStore(config.uploadsDir);
  const extraction = createDefaultCascade(config);
  const inference = createInferenceClient(config);

  const orchestrator = new PipelineOrchestrator({
    repository,
    queue,
    uploads,
    cascade: extraction.cascade,
    enrichment: new EnrichmentRunner(inference),
    matching: new MatchingPipeline({ repository, inference }),
  });
  registerPipelineWorkers(queue, orchestrator, config.workerConcurrency);

  logger.info(
    {
      storage: repository.name,
      queue: queue.name,
      inference: inference?.providerName ?? 'unavailable',
      concurrency: config.workerConcurrency,
    },
    'Pipeline runtime ready',
  );

  return {
    repository,
    queue,
    uploads,
    orchestrator,
    async shutdown() {
      await queue.close();
      await extraction.shutdown();
      await shutdownRedis();
    },
  };
}
