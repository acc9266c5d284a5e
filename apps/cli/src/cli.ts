import type { CredentialProvider } from '@tradegate/types';
import { OrderManager } from '@tradegate/exchange';
import { createLogger, loadConfig } from '@tradegate/utils';
import type { Logger } from '@tradegate/utils';
import { EXIT_CODES, USAGE, exitCodeFor, formatError, parseCommand, runCommand } from './commands';

export interface CliIo {
  env: NodeJS.ProcessEnv;
  out: (line: string) => void;
  err: (line: string) => void;
  /** Asked for credentials when a live mode has none configured */
  prompt?: CredentialProvider;
  logger?: Logger;
}

/**
 * Run one CLI invocation and resolve to its exit code. Never rejects.
 */
export async function main(argv: readonly string[], io: CliIo): Promise<number> {
  const logger = io.logger ?? createLogger({ service: 'cli', destination: process.stderr });

  try {
    const command = parseCommand(argv);
    if (command.command === 'help') {
      USAGE.forEach((line) => io.out(line));
      return EXIT_CODES.ok;
    }

    const config = loadConfig(io.env);
    const hasCredentials = config.apiKey !== undefined && config.apiSecret !== undefined;
    const manager = new OrderManager(config, {
      credentials: config.mode !== 'mock' && !hasCredentials ? io.prompt : undefined,
      logger,
    });

    return await runCommand(command, manager, io.out);
  } catch (error) {
    io.err(formatError(error));
    return exitCodeFor(error);
  }
}
