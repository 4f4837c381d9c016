// Load environment variables first; values already set in the environment win
import { config } from 'dotenv';
import { resolve } from 'path';
config({ path: resolve(process.cwd(), '.env'), override: false });

/**
 * kpi-service entry point
 * KPI aggregation and classification over the radio counter store
 */

import {
  ErrorHandlerManager,
  createLogger,
  failFastValidation,
  registerGlobalErrorHandlers,
  serializeError,
} from '@netkpi/platform-core';
import { createApp } from './app';
import { SERVICE_NAME } from './config/service-urls';
import { KPI_ENV_VARS } from './config/kpi-config';
import { getServiceRegistry } from './infrastructure/ServiceFactory';

const logger = createLogger(SERVICE_NAME);

async function main(): Promise<void> {
  registerGlobalErrorHandlers(SERVICE_NAME);
  failFastValidation(SERVICE_NAME, KPI_ENV_VARS);

  const registry = getServiceRegistry();
  const app = createApp(registry);

  // Warm the snapshot; a failure here leaves /health reporting it and reload available
  try {
    await registry.snapshots.getSnapshot();
  } catch (error) {
    logger.warn('Initial counter snapshot load failed', { error: serializeError(error) });
  }

  const server = app.listen(registry.config.port, () => {
    logger.info('kpi-service listening', { port: registry.config.port });
  });

  ErrorHandlerManager.getInstance().registerShutdownHook(
    () =>
      new Promise<void>((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()));
      })
  );
}

main().catch(error => {
  logger.error('Failed to start kpi-service', { error: serializeError(error) });
  process.exit(1);
});
