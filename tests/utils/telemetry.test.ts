import { describe, it, expect, afterEach } from 'vitest';
import {
  initTelemetry,
  recordPageRequest,
  shutdownTelemetry,
  withSpan,
} from '../../src/utils/telemetry.js';
import { loadConfig } from '../../src/utils/config.js';

describe('telemetry', () => {
  afterEach(async () => {
    await shutdownTelemetry();
  });

  it('should return the wrapped result', async () => {
    const result = await withSpan('list.fetch', { 'list.title': 'Trips' }, async () => 42);

    expect(result).toBe(42);
  });

  it('should rethrow errors from the wrapped operation', async () => {
    await expect(
      withSpan('list.fetch', {}, async () => {
        throw new Error('page failed');
      })
    ).rejects.toThrow('page failed');
  });

  it('should record page requests once enabled without an exporter', () => {
    initTelemetry(loadConfig({ OTEL_ENABLED: 'true' }));

    expect(() => recordPageRequest('Trips', true, 3)).not.toThrow();
    expect(() => recordPageRequest('Trips', false, 0)).not.toThrow();
  });
});
