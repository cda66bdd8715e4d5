import { createPool, runMigrations } from "../src/db.js";
import { readConfig } from "../src/config.js";

async function migrate(): Promise<void> {
  const config = readConfig();
  const pool = createPool(config.databaseUrl);

  try {
    await runMigrations(pool);
    console.log(JSON.stringify({ ok: true, database: new URL(config.databaseUrl).host }, null, 2));
  } finally {
    await pool.end();
  }
}

void migrate().catch((error) => {
  console.error(String(error));
  process.exit(1);
});
