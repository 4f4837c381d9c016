/**
 * Service identity and logger wiring for kpi-service
 */

export const SERVICE_NAME = 'kpi-service';

export { createLogger as getLogger } from '@netkpi/platform-core';
