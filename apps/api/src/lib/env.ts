import dotenv from 'dotenv';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

// Load .env from monorepo root
dotenv.config({
  path: path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../../../.env'),
});

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  API_PORT: z.coerce.number().int().positive().default(5000),
  API_HOST: z.string().default('0.0.0.0'),
  CORS_ORIGIN: z.string().default('http://localhost:3000'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  PMS_ENDPOINT_URL: z
    .string()
    .url()
    .default('https://webservice.kareo.com/services/soap/2.1/KareoServices.svc'),
  PMS_NAMESPACE: z.string().default('http://www.kareo.com/api/schemas/'),
  PMS_SOAP_ACTION_PREFIX: z
    .string()
    .default('http://www.kareo.com/services/01/KareoServices/'),
  PMS_CALL_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  RUN_TIMEOUT_MS: z.coerce.number().int().positive().default(30 * 60_000),
  STORAGE_DIR: z.string().default(path.join(os.tmpdir(), 'chargeflow')),
  TARGET_SHEET_NAME: z.string().min(1).default('Charges'),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(20 * 1024 * 1024),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | undefined;

export function getEnv(): Env {
  if (!_env) {
    const result = envSchema.safeParse(process.env);
    if (!result.success) {
      console.error('Invalid environment variables:', result.error.flatten().fieldErrors);
      throw new Error('Invalid environment variables');
    }
    _env = result.data;
  }
  return _env;
}
