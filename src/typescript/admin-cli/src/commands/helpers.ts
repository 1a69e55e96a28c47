import { InvalidArgumentError } from 'commander';

export function parseId(value: string): number {
  const id = Number(value);
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return id;
}

/**
 * Runs a command action, printing failures and exiting non-zero.
 */
export async function withErrors(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error: unknown) {
    if (error instanceof Error) {
      console.error(`❌ ${error.message}`);
    } else {
      console.error('❌ An unknown error occurred');
    }
    process.exit(1);
  }
}
