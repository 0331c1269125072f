import { afterAll, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

process.on('unhandledRejection', (reason: unknown) => {
  console.error('UNHANDLED_REJECTION', reason);
});
process.on('uncaughtException', (err: Error) => {
  console.error('UNCAUGHT_EXCEPTION', err);
});

// GLOBAL TEST SANDBOX & NETWORK BLOCKING
const blockMsg = 'NETWORK BLOCKED: Unit tests must not access external resources. Use vi.spyOn() or mocks.';

vi.mock('http', async (importOriginal) => {
  const actual = await importOriginal<typeof import('http')>();
  return {
    ...actual,
    request: () => { throw new Error(blockMsg); },
    get: () => { throw new Error(blockMsg); }
  };
});

vi.mock('https', async (importOriginal) => {
  const actual = await importOriginal<typeof import('https')>();
  return {
    ...actual,
    request: () => { throw new Error(blockMsg); },
    get: () => { throw new Error(blockMsg); }
  };
});

vi.stubGlobal('fetch', async () => { throw new Error(blockMsg); });

// Capture fixtures are written below this directory (see tests/helpers/fixtures.ts).
const testDataRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'iq-test-env-'));
process.env.IQ_TEST_ROOT = testDataRoot;

afterAll(async () => {
  try {
    await fs.promises.rm(testDataRoot, { recursive: true, force: true });
  } catch (e) {
    console.error('Failed to cleanup test sandbox', e);
  }
});
