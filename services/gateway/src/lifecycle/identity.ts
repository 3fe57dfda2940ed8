import { readFile } from 'fs/promises';
import type { FastifyBaseLogger } from 'fastify';
import type { IdentityWaitOptions } from '../config';
import { MisconfigurationError } from '../errors';

// v3 addresses are 56 base32 chars; the 16-char legacy form is still accepted
const ONION_ADDRESS = /^(?:[a-z2-7]{56}|[a-z2-7]{16})\.onion$/;

export type IdentityLogger = Pick<FastifyBaseLogger, 'info' | 'warn'>;

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Validates the contents of a hidden-service hostname file: exactly one
 * non-empty line holding an onion address. Returns the lower-cased address.
 */
export function parseIdentity(contents: string): string {
  const lines = contents.split(/\r?\n/).filter((line) => line.trim().length > 0);
  if (lines.length !== 1) {
    throw new MisconfigurationError(`identity file must contain exactly one line, found ${lines.length}`);
  }

  const address = lines[0].trim().toLowerCase();
  if (!ONION_ADDRESS.test(address)) {
    throw new MisconfigurationError(`identity file does not hold an onion address: ${JSON.stringify(address)}`);
  }
  return address;
}

export async function readIdentity(path: string): Promise<string> {
  const contents = await readFile(path, 'utf8');
  return parseIdentity(contents);
}

/** Delay before retry number `attempt` (1-based): doubles each time, capped. */
export function backoffDelay(attempt: number, options: IdentityWaitOptions): number {
  return Math.min(options.backoffMs * 2 ** (attempt - 1), options.maxBackoffMs);
}

/**
 * Polls the hidden-service hostname file until it holds a valid identity.
 * A missing file is expected while the daemon starts; a file with bad
 * contents is retried too, in case it was read mid-write.
 * Gives up with MisconfigurationError once `retries` attempts are spent.
 */
export async function waitForIdentity(
  path: string,
  options: IdentityWaitOptions,
  log: IdentityLogger,
  wait: (ms: number) => Promise<void> = sleep,
): Promise<string> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= options.retries; attempt++) {
    try {
      const identity = await readIdentity(path);
      log.info({ attempt, identity }, 'Hidden-service identity published');
      return identity;
    } catch (err) {
      lastError = err;
      if (attempt === options.retries) break;

      const delay = backoffDelay(attempt, options);
      log.warn(
        { attempt, retries: options.retries, delayMs: delay, reason: describe(err) },
        'Hidden-service identity not available yet',
      );
      await wait(delay);
    }
  }

  throw new MisconfigurationError(
    `hidden-service identity not published at ${path} after ${options.retries} attempts: ${describe(lastError)}`,
    { cause: lastError },
  );
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
