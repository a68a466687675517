// ============================================================================
// Billing Run — Service
// Accepts an upload, validates it synchronously, then hands it to one
// background worker that runs the phase pipeline and publishes the result
// to the task store.
// ============================================================================

import type { Readable } from 'node:stream';
import {
  OUTPUT_FILE_EXTENSION,
  OUTPUT_FILE_PREFIX,
  TaskStatus,
  XLSX_MIME_TYPE,
} from '@chargeflow/shared/constants/billing-run.constants.js';
import { artifactRefPattern } from '@chargeflow/shared/schemas/validation/billing-run.validation.js';
import { AppError, NotFoundError, UnrecoverableSetupError } from '../../../lib/errors.js';
import type { FileStorage } from '../../../lib/file-storage.js';
import type { Logger } from '../../../lib/logger.js';
import type { PmsClient, PmsClientFactory, PmsCredentials } from '../pms/pms.client.js';
import type { TaskRecord, TaskStatusRepository } from '../repos/task-status.repo.js';
import { createPhasePipeline, type PolicySelector } from './phase-pipeline.service.js';
import {
  artifactKey,
  attachmentDisposition,
  downloadNameFor,
  type ResultMaterializer,
} from './result-materializer.service.js';
import type { ChargeSheet, SheetNormalizer } from './sheet-normalizer.service.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SubmitRunInput {
  file: { data: Buffer; filename: string };
  credentials: PmsCredentials;
}

export interface SubmittedRun {
  taskId: string;
  status: typeof TaskStatus.PENDING;
}

export interface ArtifactDownload {
  stream: Readable;
  contentType: string;
  contentDisposition: string;
  fileSizeBytes: number;
}

export interface BillingRunServiceDeps {
  normalizer: SheetNormalizer;
  tasks: TaskStatusRepository;
  materializer: ResultMaterializer;
  storage: FileStorage;
  createClient: PmsClientFactory;
  logger: Logger;
  runTimeoutMs?: number;
  selectPolicy?: PolicySelector;
  /** Starts a worker; defaults to the next turn of the event loop. */
  schedule?: (job: () => void) => void;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** `Processed_Data_<id>.xlsx` → `<id>` */
function taskIdFromRef(outputRef: string): string {
  return outputRef.slice(OUTPUT_FILE_PREFIX.length, -OUTPUT_FILE_EXTENSION.length);
}

// ---------------------------------------------------------------------------
// Service Factory
// ---------------------------------------------------------------------------

export function createBillingRunService(deps: BillingRunServiceDeps) {
  const {
    normalizer,
    tasks,
    materializer,
    storage,
    createClient,
    logger,
    schedule = (job) => {
      setImmediate(job);
    },
  } = deps;

  /**
   * Worker body. Every failure ends in a terminal task status; nothing is
   * thrown back to the scheduler.
   */
  async function executeRun(
    taskId: string,
    sheet: ChargeSheet,
    originalName: string,
    credentials: PmsCredentials,
  ): Promise<void> {
    const log = logger.child({ taskId });
    log.info({ rows: sheet.rows.length, originalName }, 'Billing run started');

    try {
      let client: PmsClient;
      try {
        client = createClient(credentials);
      } catch (err) {
        throw err instanceof AppError
          ? err
          : new UnrecoverableSetupError(`Could not initialise PMS client: ${errorMessage(err)}`);
      }

      const pipeline = createPhasePipeline({
        client,
        logger: log,
        runTimeoutMs: deps.runTimeoutMs,
        selectPolicy: deps.selectPolicy,
      });
      await pipeline.run(sheet);

      const result = await materializer.materialize(taskId, sheet);
      await tasks.setCompleted(taskId, result.outputRef, originalName, result.message, result.summary);
      log.info({ outputRef: result.outputRef }, 'Billing run completed');
    } catch (err) {
      const message =
        err instanceof UnrecoverableSetupError
          ? err.message
          : `Processing failed: ${errorMessage(err)}`;
      log.error({ err }, 'Billing run failed');
      await tasks.setError(taskId, message);
    }
  }

  /**
   * Validate the upload and start a worker. Schema failures throw before a
   * task exists.
   */
  async function submitRun(input: SubmitRunInput): Promise<SubmittedRun> {
    const sheet = await normalizer.parseWorkbook(input.file.data, input.file.filename);
    const taskId = await tasks.create();

    schedule(() => {
      executeRun(taskId, sheet, input.file.filename, input.credentials).catch((err: unknown) => {
        logger.error({ err, taskId }, 'Billing run worker crashed');
      });
    });

    logger.info({ taskId, rows: sheet.rows.length }, 'Billing run queued');
    return { taskId, status: TaskStatus.PENDING };
  }

  async function getStatus(taskId: string): Promise<TaskRecord> {
    return tasks.get(taskId);
  }

  /** Download name for a completed task, dated by its completion. */
  function downloadName(task: TaskRecord): string | null {
    if (task.status !== TaskStatus.COMPLETED || !task.originalName) return null;
    return downloadNameFor(task.originalName, new Date(task.updatedAt));
  }

  async function getArtifact(outputRef: string): Promise<ArtifactDownload> {
    if (!artifactRefPattern.test(outputRef)) throw new NotFoundError('Artifact');

    const key = artifactKey(outputRef);
    const info = await storage.stat(key);
    if (!info) throw new NotFoundError('Artifact');

    let filename = outputRef;
    try {
      const task = await tasks.get(taskIdFromRef(outputRef));
      filename = downloadName(task) ?? outputRef;
    } catch (err) {
      if (!(err instanceof NotFoundError)) throw err;
    }

    return {
      stream: storage.createReadStream(key),
      contentType: XLSX_MIME_TYPE,
      contentDisposition: attachmentDisposition(filename),
      fileSizeBytes: info.sizeBytes,
    };
  }

  return {
    submitRun,
    executeRun,
    getStatus,
    downloadName,
    getArtifact,
  };
}

export type BillingRunService = ReturnType<typeof createBillingRunService>;
