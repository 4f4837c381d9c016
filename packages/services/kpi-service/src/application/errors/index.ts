export { KpiError, KpiErrorCode, type KpiErrorCodeType } from './errors';
