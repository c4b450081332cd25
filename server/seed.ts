import { storage, type IStorage } from "./storage";
import { closeDb } from "./db";
import type { User } from "@shared/schema";
import { ValidationError, getErrorMessage } from "./errors/app-errors";
import { log as baseLog } from "./utils/logger";

const log = baseLog.child({ component: "Seed" });

export interface SeedOptions {
  adminEmail: string;
  analysts: Array<{ email: string; categories: string[] }>;
}

/**
 * Creates the admin and analyst accounts if missing and sets each analyst's
 * grants to exactly the listed categories. Categories must already exist
 * (run ingestion first). Safe to re-run.
 */
export async function seedDatabase(target: IStorage, options: SeedOptions): Promise<User[]> {
  const seeded: User[] = [];

  const admin = await target.getUserByEmail(options.adminEmail)
    ?? await target.createUser({ email: options.adminEmail, role: "admin" });
  seeded.push(admin);
  log.info({ userId: admin.id, email: admin.email }, "Admin ready");

  if (options.analysts.length === 0) {
    return seeded;
  }

  const byName = new Map((await target.listCategories()).map((category) => [category.name, category.id]));

  for (const analyst of options.analysts) {
    const categoryIds = analyst.categories.map((name) => {
      const id = byName.get(name);
      if (id === undefined) {
        throw new ValidationError(`Unknown category: ${name}`, { email: analyst.email });
      }
      return id;
    });

    const user = await target.getUserByEmail(analyst.email)
      ?? await target.createUser({ email: analyst.email, role: "analyst" });
    const updated = await target.replaceUserCategories(user.id, categoryIds);
    seeded.push(updated);
    log.info({ userId: updated.id, email: updated.email, grants: categoryIds.length }, "Analyst ready");
  }

  return seeded;
}

/**
 * --analyst <email>=<Category A|Category B>   (repeatable)
 */
export function parseSeedArgs(args: string[], adminEmail: string): SeedOptions {
  const analysts: SeedOptions["analysts"] = [];
  for (let index = 0; index < args.length; index++) {
    if (args[index] !== "--analyst") continue;
    const value = args[index + 1] ?? "";
    const separator = value.indexOf("=");
    if (separator <= 0) {
      throw new ValidationError(`Expected --analyst <email>=<categories>, got "${value}"`);
    }
    analysts.push({
      email: value.slice(0, separator).trim(),
      categories: value.slice(separator + 1).split("|").map((name) => name.trim()).filter(Boolean),
    });
    index++;
  }
  return { adminEmail, analysts };
}

if (require.main === module) {
  const options = parseSeedArgs(process.argv.slice(2), process.env.ADMIN_EMAIL || "admin@example.com");
  seedDatabase(storage, options)
    .then(() => closeDb())
    .catch((error: unknown) => {
      log.error({ err: error }, `Seed failed: ${getErrorMessage(error)}`);
      process.exit(1);
    });
}
