import { Command } from 'commander';
import {
  DEFAULT_NOTIFICATION_TITLE,
  DeviceSession,
  rootLogger,
} from '@tvlink/core';
import type { CommandResult } from '@tvlink/models';
import { FileConfigProvider } from './config-loader.js';
import { DesktopNotifier } from './notifications/desktop-notifier.js';
import type { CommandContext } from './commands/context.js';
import { getSetting, setSettings } from './commands/settings.js';
import { parseRequestPayload, sendRequest } from './commands/request.js';
import { parseSettingAssignments } from './utils/parse-setting.js';

export interface GlobalOptions {
  title: string;
  device?: string;
  config?: string;
  verbose?: boolean;
}

export interface ProgramIO {
  out: (line: string) => void;
  err: (line: string) => void;
  setExitCode: (code: number) => void;
}

const consoleIO: ProgramIO = {
  out: (line) => console.info(line),
  err: (line) => console.error(line),
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

/**
 * Wires the real collaborators: JSON config file, notify-send, TLS socket.
 */
export function createDefaultContext(options: GlobalOptions): CommandContext {
  return {
    provider: new FileConfigProvider({ path: options.config, deviceName: options.device }),
    notifier: new DesktopNotifier(),
    title: options.title,
    createSession: (target) => new DeviceSession(target),
  };
}

/**
 * Builds the `tvlink` command tree.
 * @param createContext - Context factory, replaced in tests
 * @param io - Output sinks (default: console)
 */
export function createProgram(
  createContext: (options: GlobalOptions) => CommandContext = createDefaultContext,
  io: ProgramIO = consoleIO,
): Command {
  const program: Command = new Command();

  program
    .name('tvlink')
    .description('Send single commands to an LG webOS TV, retrying through wake-up errors')
    .option('--title <title>', 'notification title', DEFAULT_NOTIFICATION_TITLE)
    .option('--device <name>', 'device name from the config file (overrides LGTV_NAME)')
    .option('--config <path>', 'config file path (overrides TVLINK_CONFIG)')
    .option('--verbose', 'print debug logs to stderr')
    .showHelpAfterError();

  program.hook('preAction', () => {
    if (program.opts<GlobalOptions>().verbose) {
      rootLogger.level = 'debug';
    }
  });

  const parseArgument = <T>(parse: () => T): T => {
    try {
      return parse();
    } catch (error) {
      return program.error(error instanceof Error ? error.message : String(error));
    }
  };

  const report = <T>(result: CommandResult<T>): void => {
    if (result.ok) {
      io.out(JSON.stringify(result.payload));
      return;
    }
    io.err(result.error);
    io.setExitCode(1);
  };

  program
    .command('get <category> <key>')
    .description('Print one system setting, e.g. "get picture backlight"')
    .action(async (category: string, key: string) => {
      report(await getSetting(createContext(program.opts<GlobalOptions>()), category, key));
    });

  program
    .command('set <category> <assignments...>')
    .description('Update system settings, e.g. "set picture backlight=70 contrast=85"')
    .action(async (category: string, assignments: string[]) => {
      const settings = parseArgument(() => parseSettingAssignments(assignments));
      report(await setSettings(createContext(program.opts<GlobalOptions>()), category, settings));
    });

  program
    .command('request <uri> [payload]')
    .description('Send a raw ssap:// request with an optional JSON payload')
    .action(async (uri: string, payloadText: string | undefined) => {
      const payload = parseArgument(() => parseRequestPayload(payloadText));
      report(await sendRequest(createContext(program.opts<GlobalOptions>()), uri, payload));
    });

  return program;
}
