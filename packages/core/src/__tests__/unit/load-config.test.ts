/**
 * Tests for loadConfigOrNotify
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { ConfigProvider } from '@tvlink/models';
import { loadConfigOrNotify } from '../../config/load-config.js';
import { ConfigError } from '../../errors/index.js';
import { MemoryNotificationSink } from '../../notifications/index.js';

const rejecting = (error: Error): ConfigProvider => ({
  load: async () => {
    throw error;
  },
});

describe('loadConfigOrNotify', () => {
  let sink: MemoryNotificationSink;

  beforeEach(() => {
    sink = new MemoryNotificationSink();
  });

  it('returns the target without notifying', async () => {
    const provider: ConfigProvider = {
      load: async () => ({ address: '192.168.1.40', key: 'test-key', name: 'MyTV' }),
    };

    await expect(loadConfigOrNotify(provider, sink, 'LG TV')).resolves.toEqual({
      address: '192.168.1.40',
      key: 'test-key',
      name: 'MyTV',
    });
    expect(sink.notifications).toEqual([]);
  });

  it('turns a config error into one critical notification', async () => {
    const provider = rejecting(new ConfigError('No TVs configured', 'not-found'));

    await expect(loadConfigOrNotify(provider, sink, 'TV Brightness')).resolves.toBeUndefined();
    expect(sink.notifications).toEqual([
      {
        title: 'TV Brightness',
        message: 'Config error: No TVs configured',
        urgency: 'critical',
        timeoutMs: 2000,
      },
    ]);
  });

  it('rethrows other errors', async () => {
    const provider = rejecting(new Error('EACCES'));

    await expect(loadConfigOrNotify(provider, sink, 'LG TV')).rejects.toThrow('EACCES');
    expect(sink.notifications).toEqual([]);
  });
});
