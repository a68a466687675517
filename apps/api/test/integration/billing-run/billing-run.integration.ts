// ============================================================================
// Billing Run — Integration Tests
// Upload → poll → download through the composed app, with local storage in a
// temp directory and an in-process PMS fake.
// ============================================================================

import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import ExcelJS from 'exceljs';
import type { FastifyInstance } from 'fastify';
import { XLSX_MIME_TYPE } from '@chargeflow/shared/constants/billing-run.constants.js';
import type { Env } from '../../../src/lib/env.js';
import { createLocalFileStorage } from '../../../src/lib/file-storage.js';
import { buildApp } from '../../../src/server.js';
import { createTaskStatusRepository } from '../../../src/domains/billing-run/repos/task-status.repo.js';
import { createBillingRunService } from '../../../src/domains/billing-run/services/billing-run.service.js';
import { createResultMaterializer } from '../../../src/domains/billing-run/services/result-materializer.service.js';
import { createSheetNormalizer } from '../../../src/domains/billing-run/services/sheet-normalizer.service.js';
import {
  CREDENTIAL_FIELDS,
  buildMultipartPayload,
  buildWorkbookBuffer,
  createFakePmsClient,
  makeRowValues,
  rowCells,
  silentLogger,
  type FakePmsClient,
} from '../../fixtures/billing-run.fixtures.js';

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

function testEnv(storageDir: string): Env {
  return {
    NODE_ENV: 'test',
    API_PORT: 5000,
    API_HOST: '127.0.0.1',
    CORS_ORIGIN: 'http://localhost:3000',
    LOG_LEVEL: 'silent',
    PMS_ENDPOINT_URL: 'https://pms.example.test/soap',
    PMS_NAMESPACE: 'http://pms.example.test/schemas/',
    PMS_SOAP_ACTION_PREFIX: 'http://pms.example.test/actions/',
    PMS_CALL_TIMEOUT_MS: 1000,
    RUN_TIMEOUT_MS: 60_000,
    STORAGE_DIR: storageDir,
    TARGET_SHEET_NAME: 'Charges',
    MAX_UPLOAD_BYTES: 1024 * 1024,
  };
}

let storageDir: string;
let app: FastifyInstance;
let client: FakePmsClient;

beforeEach(async () => {
  storageDir = await mkdtemp(path.join(os.tmpdir(), 'billing-run-'));
  const env = testEnv(storageDir);
  const storage = createLocalFileStorage(env.STORAGE_DIR);
  client = createFakePmsClient();

  const billingRunService = createBillingRunService({
    normalizer: createSheetNormalizer({ sheetName: env.TARGET_SHEET_NAME }),
    tasks: createTaskStatusRepository({ storage }),
    materializer: createResultMaterializer({ storage, logger: silentLogger }),
    storage,
    createClient: () => client,
    logger: silentLogger,
    runTimeoutMs: env.RUN_TIMEOUT_MS,
  });

  app = await buildApp({ env, logger: silentLogger, billingRunService });
  await app.ready();
});

afterEach(async () => {
  await app.close();
  await rm(storageDir, { recursive: true, force: true });
});

async function submit(workbook: Buffer, filename = 'march.xlsx') {
  const { body, boundary } = buildMultipartPayload(CREDENTIAL_FIELDS, {
    fieldname: 'file',
    filename,
    contentType: XLSX_MIME_TYPE,
    content: workbook,
  });
  return app.inject({
    method: 'POST',
    url: '/api/v1/billing-runs',
    headers: { 'content-type': `multipart/form-data; boundary=${boundary}` },
    payload: body,
  });
}

async function waitForTerminal(statusUrl: string) {
  let body: { data: { status: string } & Record<string, unknown> } | undefined;
  await vi.waitFor(
    async () => {
      const res = await app.inject({ method: 'GET', url: statusUrl });
      body = res.json();
      expect(body?.data.status).not.toBe('pending');
    },
    { timeout: 5000, interval: 20 },
  );
  if (!body) throw new Error('no status response');
  return body.data;
}

// ============================================================================
// Full run
// ============================================================================

describe('billing run lifecycle', () => {
  it('processes a workbook and serves the annotated artifact', async () => {
    const workbook = await buildWorkbookBuffer([
      rowCells(
        makeRowValues({
          'PP Batch #': 'B-100',
          'Patient Payment': '25',
          'Patient Payment Source': 'Cash',
          'Reference Number': 'R-1',
        }),
      ),
      rowCells(makeRowValues({ Procedures: '87880', 'Diag 1': 'R05' })),
      rowCells(makeRowValues({ 'Patient ID': '2002' })),
    ]);

    const submitted = await submit(workbook);
    expect(submitted.statusCode).toBe(202);
    const { task_id: taskId, status_check_token: statusUrl } = submitted.json().data;
    expect(statusUrl).toBe(`/api/v1/billing-runs/${taskId}`);

    const task = await waitForTerminal(statusUrl);
    expect(task.status).toBe('completed');
    expect(task.output_ref).toBe(`Processed_Data_${taskId}.xlsx`);
    expect(task.original_name).toBe('march.xlsx');
    expect(task.message).toBe('Processed 3 row(s): 2 with encounters, 1 payment(s) posted, 1 failed.');
    expect(task.summary).toEqual({
      total_rows: 3,
      encounters_created: 2,
      payments_posted: 1,
      failed_rows: 1,
      results: [
        {
          row_number: 2,
          practice_name: 'Sunrise Clinic',
          patient_id: '1001',
          results: 'Payment #5001 Posted.; Encounter #7001 Created.',
        },
        {
          row_number: 3,
          practice_name: 'Sunrise Clinic',
          patient_id: '1001',
          results: 'Encounter #7001 Created.',
        },
        {
          row_number: 4,
          practice_name: 'Sunrise Clinic',
          patient_id: '2002',
          results:
            'P1 Error: Patient not found.; P3 Skipped: Patient ID, DOS, Practice or Patient Name missing.',
        },
      ],
    });
    expect(client.createEncounter).toHaveBeenCalledTimes(1);
    expect(client.createEncounter.mock.calls[0][0].serviceLines.map((l) => l.procedureCode)).toEqual([
      '99213',
      '87880',
    ]);

    const download = await app.inject({
      method: 'GET',
      url: `/api/v1/billing-runs/artifacts/${String(task.output_ref)}`,
    });
    expect(download.statusCode).toBe(200);
    expect(download.headers['content-type']).toBe(XLSX_MIME_TYPE);
    expect(download.headers['content-disposition']).toBe(
      `attachment; filename="${String(task.download_name)}"`,
    );

    const output = new ExcelJS.Workbook();
    await output.xlsx.load(download.rawPayload);
    const sheet = output.getWorksheet('Charges');
    expect(sheet).toBeDefined();
    if (!sheet) return;

    const headers: string[] = [];
    sheet.getRow(1).eachCell((c) => headers.push(String(c.value)));
    const value = (row: number, header: string) =>
      sheet.getRow(row).getCell(headers.indexOf(header) + 1).value;

    expect(value(2, 'Patient Name')).toBe('Alex Morgan');
    expect(value(2, 'Encounter ID')).toBe('7001');
    expect(value(3, 'Encounter ID')).toBe('7001');
    expect(value(4, 'Insurance Status')).toBe('Patient Not Found');
  });

  it('rejects a workbook missing critical columns before creating a task', async () => {
    const headers = ['Patient ID', 'Practice', 'DOS'];
    const workbook = await buildWorkbookBuffer([['1001', 'Sunrise Clinic', '2024-03-15']], {
      headers,
    });

    const res = await submit(workbook);

    expect(res.statusCode).toBe(400);
    const body = res.json();
    expect(body.error.code).toBe('SCHEMA_VALIDATION_ERROR');
    expect(body.error.details.missingColumns).toEqual([
      'Rendering Provider',
      'Encounter Mode',
      'POS',
      'Procedures',
      'Units',
      'Diag 1',
    ]);
    expect(client.getPatient).not.toHaveBeenCalled();
  });

  it('completes with per-row failures when patient lookups fail', async () => {
    client.getPatient.mockRejectedValue(new Error('unreachable'));
    const workbook = await buildWorkbookBuffer([rowCells(makeRowValues())]);

    const submitted = await submit(workbook);
    const task = await waitForTerminal(submitted.json().data.status_check_token);

    expect(task.status).toBe('completed');
    expect(task.message).toBe('Processed 1 row(s): 0 with encounters, 0 payment(s) posted, 1 failed.');
  });

  it('returns 404 for unknown tasks and artifacts', async () => {
    const status = await app.inject({
      method: 'GET',
      url: '/api/v1/billing-runs/00000000-0000-4000-8000-000000000000',
    });
    expect(status.statusCode).toBe(404);

    const artifact = await app.inject({
      method: 'GET',
      url: '/api/v1/billing-runs/artifacts/Processed_Data_00000000-0000-4000-8000-000000000000.xlsx',
    });
    expect(artifact.statusCode).toBe(404);
  });

  it('answers the health check', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });
    expect(res.json()).toEqual({ status: 'ok' });
  });
});
