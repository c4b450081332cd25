/**
 * Issues a bearer token for an existing user.
 *
 * Usage: npx tsx server/scripts/issue-token.ts <email> [ttlSeconds]
 */

import { storage } from '../storage';
import { closeDb } from '../db';
import { getEnv } from '../config/env';
import { generateToken } from '../middleware/auth';
import { NotFoundError, ValidationError, getErrorMessage } from '../errors/app-errors';
import { log } from '../utils/logger';

async function main() {
  const [email, ttlArg] = process.argv.slice(2);
  if (!email) {
    throw new ValidationError('Usage: issue-token.ts <email> [ttlSeconds]');
  }
  const ttl = ttlArg === undefined ? undefined : Number(ttlArg);
  if (ttl !== undefined && (!Number.isInteger(ttl) || ttl <= 0)) {
    throw new ValidationError(`ttlSeconds must be a positive integer, got "${ttlArg}"`);
  }

  const user = await storage.getUserByEmail(email);
  if (!user) {
    throw new NotFoundError(`No user with email ${email}`);
  }

  // Printed bare so it can be captured by the shell
  process.stdout.write(`${generateToken(user.id, getEnv().SESSION_SECRET, ttl)}\n`);
  await closeDb();
}

main().catch((error: unknown) => {
  log.error(`Token issue failed: ${getErrorMessage(error)}`);
  process.exit(1);
});
