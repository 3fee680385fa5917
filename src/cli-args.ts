/**
 * Command-line argument parsing for the predictor CLI
 */

import { portSchema } from './config/config.js';

export interface CliArgs {
  command: 'serve' | 'check' | 'help';
  port?: number;
  host?: string;
}

/**
 * Value following a flag; flags and the end of argv do not count
 */
function flagValue(args: string[], index: number, flag: string): string {
  const value = args[index]?.trim();
  if (!value || value.startsWith('-')) {
    throw new Error(`${flag} expects a value`);
  }
  return value;
}

export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    command: 'serve',
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === 'serve' || arg === 'check' || arg === 'help') {
      result.command = arg;
    } else if (arg === '--port' || arg === '-p') {
      const port = portSchema.safeParse(flagValue(args, ++i, arg));
      if (!port.success) {
        throw new Error(`${arg} expects a port number between 0 and 65535`);
      }
      result.port = port.data;
    } else if (arg === '--host') {
      result.host = flagValue(args, ++i, arg);
    } else if (arg === '--help' || arg === '-h') {
      result.command = 'help';
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return result;
}
