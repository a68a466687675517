// ============================================================================
// Billing Run — Zod Validation Schemas
// ============================================================================

import { z } from 'zod';
import {
  OUTPUT_FILE_PREFIX,
  OUTPUT_FILE_EXTENSION,
  TaskStatus,
} from '../../constants/billing-run.constants.js';

// --- Helpers ---

const requiredText = (field: string) =>
  z
    .string({ required_error: `${field} is required` })
    .trim()
    .min(1, `${field} is required`)
    .max(200);

const UUID_PATTERN = '[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}';

// ============================================================================
// Submission
// ============================================================================

// --- Remote PMS Credentials (multipart form fields) ---
// The password is taken as-is; whitespace can be significant.

export const submitRunFieldsSchema = z.object({
  customer_key: requiredText('customer_key'),
  username: requiredText('username'),
  password: z
    .string({ required_error: 'password is required' })
    .min(1, 'password is required')
    .max(200),
});

export type SubmitRunFields = z.infer<typeof submitRunFieldsSchema>;

// ============================================================================
// Status & Download
// ============================================================================

export const taskIdParamSchema = z.object({
  task_id: z.string().uuid(),
});

export type TaskIdParam = z.infer<typeof taskIdParamSchema>;

export const artifactRefPattern = new RegExp(
  `^${OUTPUT_FILE_PREFIX}${UUID_PATTERN}\\${OUTPUT_FILE_EXTENSION}$`,
);

export const artifactRefParamSchema = z.object({
  output_ref: z.string().min(1).max(200),
});

export type ArtifactRefParam = z.infer<typeof artifactRefParamSchema>;

// ============================================================================
// Status Response
// ============================================================================

export const runRowResultSchema = z.object({
  row_number: z.number(),
  practice_name: z.string(),
  patient_id: z.string(),
  results: z.string(),
});

export const runSummarySchema = z.object({
  total_rows: z.number(),
  encounters_created: z.number(),
  payments_posted: z.number(),
  failed_rows: z.number(),
  results: z.array(runRowResultSchema),
});

export const taskStatusSchema = z.object({
  task_id: z.string(),
  status: z.nativeEnum(TaskStatus),
  output_ref: z.string().optional(),
  original_name: z.string().optional(),
  download_name: z.string().optional(),
  message: z.string().optional(),
  summary: runSummarySchema.optional(),
});

export type TaskStatusBody = z.infer<typeof taskStatusSchema>;

export const taskStatusResponseSchema = z.object({
  data: taskStatusSchema,
});
