import { randomUUID } from 'node:crypto';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import Fastify, { type FastifyInstance, type RawServerDefault } from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import { serializerCompiler, validatorCompiler } from 'fastify-type-provider-zod';
import { getEnv, type Env } from './lib/env.js';
import { createLocalFileStorage } from './lib/file-storage.js';
import { createLogger, type Logger } from './lib/logger.js';
import { errorHandlerPluginFp } from './plugins/error-handler.plugin.js';
import { rateLimitPluginFp } from './plugins/rate-limit.plugin.js';
import { createPmsClient } from './domains/billing-run/pms/pms.client.js';
import { createTaskStatusRepository } from './domains/billing-run/repos/task-status.repo.js';
import { billingRunRoutes } from './domains/billing-run/routes/billing-run.routes.js';
import {
  createBillingRunService,
  type BillingRunService,
} from './domains/billing-run/services/billing-run.service.js';
import { createResultMaterializer } from './domains/billing-run/services/result-materializer.service.js';
import { createSheetNormalizer } from './domains/billing-run/services/sheet-normalizer.service.js';

// ---------------------------------------------------------------------------
// Composition
// ---------------------------------------------------------------------------

export interface BuildAppOptions {
  env?: Env;
  logger?: Logger;
  /** Replaces the service composed from env (tests). */
  billingRunService?: BillingRunService;
  rateLimitMax?: number;
}

export function createBillingRunServiceFromEnv(env: Env, logger: Logger): BillingRunService {
  const storage = createLocalFileStorage(env.STORAGE_DIR);
  const pmsConfig = {
    endpointUrl: env.PMS_ENDPOINT_URL,
    namespace: env.PMS_NAMESPACE,
    soapActionPrefix: env.PMS_SOAP_ACTION_PREFIX,
    timeoutMs: env.PMS_CALL_TIMEOUT_MS,
  };

  return createBillingRunService({
    normalizer: createSheetNormalizer({ sheetName: env.TARGET_SHEET_NAME }),
    tasks: createTaskStatusRepository({ storage }),
    materializer: createResultMaterializer({ storage, logger }),
    storage,
    createClient: (credentials) => createPmsClient(credentials, { config: pmsConfig, logger }),
    logger,
    runTimeoutMs: env.RUN_TIMEOUT_MS,
  });
}

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const env = options.env ?? getEnv();
  const logger = options.logger ?? createLogger({ level: env.LOG_LEVEL });

  const app = Fastify<RawServerDefault>({
    loggerInstance: logger,
    genReqId: () => randomUUID(),
  });

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  // Register plugins
  await app.register(helmet);
  await app.register(cors, { origin: env.CORS_ORIGIN });
  await app.register(rateLimitPluginFp, { defaultMax: options.rateLimitMax });
  await app.register(errorHandlerPluginFp);

  // Health check
  app.get('/health', async () => ({ status: 'ok' }));

  await app.register(billingRunRoutes, {
    deps: {
      billingRunService: options.billingRunService ?? createBillingRunServiceFromEnv(env, logger),
      maxUploadBytes: env.MAX_UPLOAD_BYTES,
    },
  });

  return app;
}

// Start server when run directly
const isEntrypoint =
  process.argv[1] !== undefined &&
  path.resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (isEntrypoint) {
  const env = getEnv();
  buildApp({ env })
    .then((app) =>
      app.listen({ port: env.API_PORT, host: env.API_HOST }).catch((err: unknown) => {
        app.log.error(err);
        process.exit(1);
      }),
    )
    .catch((err: unknown) => {
      console.error(err);
      process.exit(1);
    });
}
