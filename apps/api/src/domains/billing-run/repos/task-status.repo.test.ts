import { describe, it, expect, beforeEach } from 'vitest';
import { ConflictError, NotFoundError } from '../../../lib/errors.js';
import { createMemoryStorage } from '../../../../test/fixtures/billing-run.fixtures.js';
import { createTaskStatusRepository, type TaskStatusRepository } from './task-status.repo.js';

describe('TaskStatusRepository', () => {
  let storage: ReturnType<typeof createMemoryStorage>;
  let repo: TaskStatusRepository;
  let now: Date;

  beforeEach(() => {
    storage = createMemoryStorage();
    now = new Date('2024-03-15T10:00:00.000Z');
    repo = createTaskStatusRepository({ storage, clock: () => now });
  });

  it('creates a pending task record', async () => {
    const taskId = await repo.create();

    expect(taskId).toMatch(/^[0-9a-f-]{36}$/);
    expect(storage.files.has(`tasks/${taskId}.json`)).toBe(true);
    expect(await repo.get(taskId)).toEqual({
      taskId,
      status: 'pending',
      outputRef: null,
      originalName: null,
      message: null,
      summary: null,
      createdAt: '2024-03-15T10:00:00.000Z',
      updatedAt: '2024-03-15T10:00:00.000Z',
    });
  });

  it('completes a task with its artifact and summary', async () => {
    const taskId = await repo.create();
    now = new Date('2024-03-15T10:05:00.000Z');
    const summary = {
      total_rows: 1,
      encounters_created: 1,
      payments_posted: 0,
      failed_rows: 0,
      results: [{ row_number: 2, practice_name: 'Sunrise Clinic', patient_id: '1001', results: 'ok' }],
    };

    await repo.setCompleted(taskId, 'Processed_Data_x.xlsx', 'march.xlsx', 'Done', summary);
    const task = await repo.get(taskId);

    expect(task.status).toBe('completed');
    expect(task.outputRef).toBe('Processed_Data_x.xlsx');
    expect(task.originalName).toBe('march.xlsx');
    expect(task.message).toBe('Done');
    expect(task.summary).toEqual(summary);
    expect(task.createdAt).toBe('2024-03-15T10:00:00.000Z');
    expect(task.updatedAt).toBe('2024-03-15T10:05:00.000Z');
  });

  it('records an error message', async () => {
    const taskId = await repo.create();
    const task = await repo.setError(taskId, 'Processing failed: boom');
    expect(task.status).toBe('error');
    expect(task.message).toBe('Processing failed: boom');
    expect(task.outputRef).toBeNull();
  });

  it('allows pending to be set again before completion', async () => {
    const taskId = await repo.create();
    expect((await repo.setPending(taskId)).status).toBe('pending');
  });

  it('refuses to leave a terminal status', async () => {
    const taskId = await repo.create();
    await repo.setError(taskId, 'failed');

    await expect(repo.setCompleted(taskId, 'x.xlsx', 'a.xlsx', 'Done')).rejects.toBeInstanceOf(ConflictError);
    await expect(repo.setPending(taskId)).rejects.toThrow(`Task ${taskId} is already error`);
    expect((await repo.get(taskId)).status).toBe('error');
  });

  it('lets only the first of two concurrent transitions win', async () => {
    const taskId = await repo.create();

    const results = await Promise.allSettled([
      repo.setCompleted(taskId, 'x.xlsx', 'a.xlsx', 'Done'),
      repo.setError(taskId, 'late failure'),
    ]);

    expect(results.map((r) => r.status)).toEqual(['fulfilled', 'rejected']);
    expect((await repo.get(taskId)).status).toBe('completed');
  });

  it('reports unknown and malformed ids as not found', async () => {
    await expect(repo.get('00000000-0000-4000-8000-000000000000')).rejects.toBeInstanceOf(NotFoundError);
    await expect(repo.get('../secrets')).rejects.toThrow('Task not found');
    await expect(repo.setError('00000000-0000-4000-8000-000000000000', 'x')).rejects.toBeInstanceOf(
      NotFoundError,
    );
  });
});
