import fs from "fs";
import path from "path";
import { closePool, query } from "./db";

function findMigrationsDir(): string {
  let dir = __dirname;
  for (;;) {
    for (const candidate of [path.join(dir, "migrations"), path.join(dir, "backend", "migrations")]) {
      if (fs.existsSync(candidate)) return candidate;
    }
    const parent = path.dirname(dir);
    if (parent === dir) throw new Error("Could not find migrations directory");
    dir = parent;
  }
}

export async function runMigrations(): Promise<void> {
  const migrationsDir = findMigrationsDir();
  await query(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id SERIAL PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  const applied = new Set(
    (await query<{ name: string }>("SELECT name FROM _migrations")).map((r) => r.name),
  );

  const files = fs.readdirSync(migrationsDir)
    .filter((f) => f.endsWith(".sql"))
    .sort();

  for (const file of files) {
    if (applied.has(file)) continue;
    const sql = fs.readFileSync(path.join(migrationsDir, file), "utf-8");
    await query(sql);
    await query("INSERT INTO _migrations (name) VALUES ($1)", [file]);
    console.log(`Applied migration: ${file}`);
  }
}

export async function initDb(): Promise<void> {
  await runMigrations();
}

// Run directly via: npx tsx backend/src/migrate.ts
if (require.main === module) {
  initDb()
    .then(async () => {
      console.log("Migrations complete.");
      await closePool();
    })
    .catch((err: unknown) => {
      console.error("Migration failed:", err);
      process.exit(1);
    });
}
