/**
 * Shared command-line helpers
 */

import { format } from 'date-fns';
import { ConfigurationError, describeError } from '../errors.js';

export function parseArg(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  if (index === -1) return undefined;
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigurationError(`${name} needs a value`);
  }
  return value;
}

export function hasFlag(args: string[], name: string): boolean {
  return args.includes(name);
}

export function parseDateArg(args: string[], name: string): string | undefined {
  const value = parseArg(args, name);
  if (value !== undefined && !/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    throw new ConfigurationError(`${name} must be YYYY-MM-DD, got "${value}"`);
  }
  return value;
}

export function parseIntArg(args: string[], name: string): number | undefined {
  const value = parseArg(args, name);
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

export function today(now: Date = new Date()): string {
  return format(now, 'yyyy-MM-dd');
}

/**
 * Run a command's main, mapping failures to exit codes. Configuration
 * errors exit before any work; anything else is reported through onCrash.
 */
export function runCli(main: () => Promise<void>, onCrash?: (error: unknown) => Promise<void>): void {
  void main().then(
    () => {
      process.exitCode = 0;
    },
    async (error: unknown) => {
      process.exitCode = 1;
      if (error instanceof ConfigurationError) {
        console.error(`❌ Configuration error: ${error.message}`);
        return;
      }
      console.error(`❌ ${describeError(error)}`);
      if (error instanceof Error && error.stack) console.error(error.stack);
      if (onCrash) {
        try {
          await onCrash(error);
        } catch (notifyError) {
          console.error(`❌ Could not send the error notification: ${describeError(notifyError)}`);
        }
      }
    }
  );
}
