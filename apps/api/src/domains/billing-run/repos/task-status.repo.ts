// ============================================================================
// Billing Run — Task Status Repository
// One JSON record per task under `tasks/<task_id>.json`. Status only moves
// forward: pending → completed | error.
// ============================================================================

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import {
  TERMINAL_TASK_STATUSES,
  TaskStatus,
} from '@chargeflow/shared/constants/billing-run.constants.js';
import { runSummarySchema } from '@chargeflow/shared/schemas/validation/billing-run.validation.js';
import { ConflictError, NotFoundError } from '../../../lib/errors.js';
import type { FileStorage } from '../../../lib/file-storage.js';
import type { RunSummary } from '../services/result-materializer.service.js';

// ---------------------------------------------------------------------------
// Record shape
// ---------------------------------------------------------------------------

const taskRecordSchema = z.object({
  taskId: z.string(),
  status: z.nativeEnum(TaskStatus),
  outputRef: z.string().nullable(),
  originalName: z.string().nullable(),
  message: z.string().nullable(),
  summary: runSummarySchema.nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export type TaskRecord = z.infer<typeof taskRecordSchema>;

export interface TaskStatusRepositoryDeps {
  storage: FileStorage;
  clock?: () => Date;
}

const TASK_ID_PATTERN = /^[0-9a-f-]{36}$/i;

function taskKey(taskId: string): string {
  return `tasks/${taskId}.json`;
}

// ---------------------------------------------------------------------------
// Repository Factory
// ---------------------------------------------------------------------------

export function createTaskStatusRepository(deps: TaskStatusRepositoryDeps) {
  const { storage, clock = () => new Date() } = deps;

  // Writes to one task id run one after another.
  const locks = new Map<string, Promise<unknown>>();

  function withLock<T>(taskId: string, work: () => Promise<T>): Promise<T> {
    const previous = locks.get(taskId) ?? Promise.resolve();
    const next = previous.then(work, work);
    const settled = next.catch(() => undefined);
    locks.set(taskId, settled);
    void settled.then(() => {
      if (locks.get(taskId) === settled) locks.delete(taskId);
    });
    return next;
  }

  async function read(taskId: string): Promise<TaskRecord | null> {
    if (!TASK_ID_PATTERN.test(taskId)) return null;
    const raw = await storage.read(taskKey(taskId));
    if (!raw) return null;
    return taskRecordSchema.parse(JSON.parse(raw.toString('utf8')));
  }

  async function write(record: TaskRecord): Promise<void> {
    await storage.write(taskKey(record.taskId), JSON.stringify(record, null, 2));
  }

  async function transition(
    taskId: string,
    status: TaskStatus,
    patch: Partial<Pick<TaskRecord, 'outputRef' | 'originalName' | 'message' | 'summary'>>,
  ): Promise<TaskRecord> {
    return withLock(taskId, async () => {
      const current = await read(taskId);
      if (!current) throw new NotFoundError('Task');
      if (TERMINAL_TASK_STATUSES.has(current.status)) {
        throw new ConflictError(`Task ${taskId} is already ${current.status}`);
      }
      const updated: TaskRecord = {
        ...current,
        ...patch,
        status,
        updatedAt: clock().toISOString(),
      };
      await write(updated);
      return updated;
    });
  }

  return {
    /** Create a pending task and return its id. */
    async create(): Promise<string> {
      const taskId = randomUUID();
      const now = clock().toISOString();
      await write({
        taskId,
        status: TaskStatus.PENDING,
        outputRef: null,
        originalName: null,
        message: null,
        summary: null,
        createdAt: now,
        updatedAt: now,
      });
      return taskId;
    },

    async setPending(taskId: string): Promise<TaskRecord> {
      return transition(taskId, TaskStatus.PENDING, {});
    },

    async setCompleted(
      taskId: string,
      outputRef: string,
      originalName: string,
      message: string,
      summary: RunSummary | null = null,
    ): Promise<TaskRecord> {
      return transition(taskId, TaskStatus.COMPLETED, { outputRef, originalName, message, summary });
    },

    async setError(taskId: string, message: string): Promise<TaskRecord> {
      return transition(taskId, TaskStatus.ERROR, { message });
    },

    async get(taskId: string): Promise<TaskRecord> {
      const record = await read(taskId);
      if (!record) throw new NotFoundError('Task');
      return record;
    },
  };
}

export type TaskStatusRepository = ReturnType<typeof createTaskStatusRepository>;
