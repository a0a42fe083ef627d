import { afterEach, vi } from 'vitest';
import { resetCirculationPolicy } from '../src/models/circulation-policy';

// Read by src/config/environment.ts when the first test module imports it
process.env['NODE_ENV'] = 'test';
process.env['STORAGE_DRIVER'] = 'memory';
process.env['LOG_LEVEL'] = 'error';

afterEach(() => {
  vi.useRealTimers();
  resetCirculationPolicy();
});
