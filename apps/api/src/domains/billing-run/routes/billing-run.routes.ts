// ============================================================================
// Billing Run Routes
// Upload a charge workbook, poll the run, download the processed artifact.
// ============================================================================

import { type FastifyInstance, type FastifyRequest, type FastifyReply } from 'fastify';
import multipart, { type MultipartFile } from '@fastify/multipart';
import {
  artifactRefParamSchema,
  submitRunFieldsSchema,
  taskIdParamSchema,
  taskStatusResponseSchema,
  type ArtifactRefParam,
  type SubmitRunFields,
  type TaskIdParam,
  type TaskStatusBody,
} from '@chargeflow/shared/schemas/validation/billing-run.validation.js';
import { ValidationError } from '../../../lib/errors.js';
import { uploadRateLimit } from '../../../plugins/rate-limit.plugin.js';
import type { TaskRecord } from '../repos/task-status.repo.js';
import type { BillingRunService } from '../services/billing-run.service.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface BillingRunRouteDeps {
  billingRunService: BillingRunService;
  maxUploadBytes: number;
}

export const BILLING_RUNS_PATH = '/api/v1/billing-runs';

// ---------------------------------------------------------------------------
// Helper: read the multipart body (one file + credential fields)
// ---------------------------------------------------------------------------

async function readFileBuffer(part: MultipartFile, maxBytes: number): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of part.file) {
    chunks.push(chunk);
  }
  // Truncated by the multipart fileSize limit
  if (part.file.truncated) {
    throw new ValidationError(`File exceeds maximum size of ${Math.floor(maxBytes / (1024 * 1024))}MB`);
  }
  return Buffer.concat(chunks);
}

interface ParsedUpload {
  file: { data: Buffer; filename: string };
  credentials: SubmitRunFields;
}

async function readUpload(request: FastifyRequest, maxBytes: number): Promise<ParsedUpload> {
  if (!request.isMultipart()) {
    throw new ValidationError('Expected multipart/form-data with a file and credentials');
  }

  const fields: Record<string, unknown> = {};
  let file: { data: Buffer; filename: string } | undefined;

  for await (const part of request.parts()) {
    if (part.type === 'file') {
      const data = await readFileBuffer(part, maxBytes);
      if (part.fieldname === 'file' && !file) {
        file = { data, filename: part.filename };
      }
    } else {
      fields[part.fieldname] = part.value;
    }
  }

  if (!file || !file.filename) {
    throw new ValidationError('No file uploaded');
  }

  const parsed = submitRunFieldsSchema.safeParse(fields);
  if (!parsed.success) {
    throw new ValidationError('Validation failed', parsed.error.issues);
  }
  return { file, credentials: parsed.data };
}

// ---------------------------------------------------------------------------
// Helper: task record → API response
// ---------------------------------------------------------------------------

function toTaskResponse(task: TaskRecord, downloadName: string | null): TaskStatusBody {
  return {
    task_id: task.taskId,
    status: task.status,
    ...(task.outputRef ? { output_ref: task.outputRef } : {}),
    ...(task.originalName ? { original_name: task.originalName } : {}),
    ...(downloadName ? { download_name: downloadName } : {}),
    ...(task.message ? { message: task.message } : {}),
    ...(task.summary ? { summary: task.summary } : {}),
  };
}

// ---------------------------------------------------------------------------
// Route registration
// ---------------------------------------------------------------------------

export async function billingRunRoutes(
  app: FastifyInstance,
  opts: { deps: BillingRunRouteDeps },
) {
  const { billingRunService, maxUploadBytes } = opts.deps;

  await app.register(multipart, {
    // Oversized files arrive truncated and are rejected in readFileBuffer.
    throwFileSizeLimit: false,
    limits: {
      fileSize: maxUploadBytes,
      files: 1,
    },
  });

  // =========================================================================
  // POST /api/v1/billing-runs
  // Validate the workbook and start a run. Async — returns task_id.
  // =========================================================================

  app.post(BILLING_RUNS_PATH, {
    config: { rateLimit: uploadRateLimit() },
    handler: async (request: FastifyRequest, reply: FastifyReply) => {
      const { file, credentials } = await readUpload(request, maxUploadBytes);

      const run = await billingRunService.submitRun({
        file,
        credentials: {
          customerKey: credentials.customer_key,
          user: credentials.username,
          password: credentials.password,
        },
      });

      return reply.code(202).send({
        data: {
          task_id: run.taskId,
          status: run.status,
          status_check_token: `${BILLING_RUNS_PATH}/${run.taskId}`,
        },
      });
    },
  });

  // =========================================================================
  // GET /api/v1/billing-runs/artifacts/:output_ref
  // Stream the processed workbook.
  // =========================================================================

  app.get(`${BILLING_RUNS_PATH}/artifacts/:output_ref`, {
    schema: { params: artifactRefParamSchema },
    handler: async (
      request: FastifyRequest<{ Params: ArtifactRefParam }>,
      reply: FastifyReply,
    ) => {
      const artifact = await billingRunService.getArtifact(request.params.output_ref);
      return reply
        .header('content-type', artifact.contentType)
        .header('content-disposition', artifact.contentDisposition)
        .header('content-length', artifact.fileSizeBytes)
        .send(artifact.stream);
    },
  });

  // =========================================================================
  // GET /api/v1/billing-runs/:task_id
  // Poll a run.
  // =========================================================================

  app.get(`${BILLING_RUNS_PATH}/:task_id`, {
    schema: {
      params: taskIdParamSchema,
      response: { 200: taskStatusResponseSchema },
    },
    handler: async (
      request: FastifyRequest<{ Params: TaskIdParam }>,
      reply: FastifyReply,
    ) => {
      const task = await billingRunService.getStatus(request.params.task_id);
      return reply.send({ data: toTaskResponse(task, billingRunService.downloadName(task)) });
    },
  });
}
