export { createMockLogger, type MockLogger } from './logger-mock.js';

export { createMockCounterTotals, createMockCounterRow, createMockSiteRow } from './counter-factories.js';
