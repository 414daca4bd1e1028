import type { TaskQueue } from '../lib/task-queue.js';
import type { PipelineOrchestrator } from './orchestrator.js';

/**
 * Attaches the orchestrator's stage handlers to their queues.
 */
export function registerPipelineWorkers(
  queue: TaskQueue,
  orchestrator: PipelineOrchestrator,
  concurrency: number,
): void {
  queue.process('extraction', (task) => orchestrator.runExtraction(task.subjectId), { concurrency });
  queue.process('enrichment', (task) => orchestrator.runEnrichment(task.subjectId), { concurrency });
  queue.process('matching', (task) => orchestrator.runMatching(task.subjectId), { concurrency });
}
