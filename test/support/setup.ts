import { beforeEach } from 'vitest';
import { Logger } from '../../src/utils/Logger';

// Keeps test output quiet; tests that assert on logs install their own sink
// fakes is loaded lazily so a test file's vi.mock of its dependencies (e.g. node-fetch) is registered first
beforeEach(async () => {
  const { MemoryLogSink } = await import('./fakes');
  Logger.useSinks(new MemoryLogSink());
  Logger.setLevel('info');
});
