/**
 * Database migration runner.
 *
 * Resolves DATABASE_URL via getDatabaseUrl from @watch-audit/shared (local
 * default in development) and runs node-pg-migrate programmatically.
 *
 * Usage: npm run migrate
 */
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { runner } from "node-pg-migrate";
import { createLogger, errorMessage, getDatabaseUrl } from "@watch-audit/shared";

const logger = createLogger({ service: "migrations" });
const __dirname = fileURLToPath(new URL(".", import.meta.url));

async function main(): Promise<void> {
  const databaseUrl = getDatabaseUrl();
  console.log("Running database migrations...");

  const migrations = await runner({
    databaseUrl,
    dir: resolve(__dirname, "migrations"),
    direction: "up",
    migrationsTable: "pgmigrations",
    verbose: false,
    log: (message: string) => logger.debug(message),
  });

  if (migrations.length === 0) {
    console.log("No new migrations to apply.");
  } else {
    console.log(`Applied ${migrations.length} migration(s):`);
    for (const m of migrations) {
      console.log(`  - ${m.name}`);
    }
  }
}

main().catch((error: unknown) => {
  logger.error(`Migration failed: ${errorMessage(error)}`);
  process.exit(1);
});
