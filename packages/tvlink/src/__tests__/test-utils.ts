/**
 * Shared fakes for CLI command tests
 */

import { vi, type Mock } from 'vitest';
import { ConfigError, MemoryNotificationSink } from '@tvlink/core';
import type {
  CommandResult,
  CommandSession,
  ConfigProvider,
  DeviceCommand,
  DeviceTarget,
  ResponsePayload,
} from '@tvlink/models';
import type { CommandContext } from '../commands/context.js';

export const testTarget: DeviceTarget = {
  address: '192.168.1.40',
  key: 'test-key',
  name: 'MyTV',
};

export class FakeSession implements CommandSession {
  public readonly commands: DeviceCommand[] = [];
  public lastError?: string;

  public constructor(
    public readonly target: DeviceTarget,
    private readonly result: CommandResult<ResponsePayload>,
  ) {}

  public async execute(command: DeviceCommand): Promise<CommandResult<ResponsePayload>> {
    this.commands.push(command);
    if (!this.result.ok) {
      this.lastError = this.result.error;
    }
    return this.result;
  }
}

export interface TestContext {
  context: CommandContext;
  notifier: MemoryNotificationSink;
  sessions: FakeSession[];
  sleep: Mock<(ms: number) => Promise<void>>;
}

/**
 * Builds a command context whose sessions return the scripted results in
 * order, repeating the last one.
 */
export function createTestContext(
  results: CommandResult<ResponsePayload>[],
  provider: ConfigProvider = { load: async () => testTarget },
  title = 'LG TV',
): TestContext {
  const notifier = new MemoryNotificationSink();
  const sessions: FakeSession[] = [];
  const sleep = vi.fn(async (_ms: number) => {});
  const context: CommandContext = {
    provider,
    notifier,
    title,
    createSession: (target) => {
      const session = new FakeSession(
        target,
        results[Math.min(sessions.length, results.length - 1)],
      );
      sessions.push(session);
      return session;
    },
    retry: { sleep },
  };
  return { context, notifier, sessions, sleep };
}

export function failingProvider(message: string): ConfigProvider {
  return {
    load: async () => {
      throw new ConfigError(message, 'not-found');
    },
  };
}
