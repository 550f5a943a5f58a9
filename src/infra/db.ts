import { Pool } from "pg";

import { loadEnv } from "@/config/env";
import { ensureLogger } from "@/infra/observability";

let pool: Pool | null = null;

export function getPool(): Pool {
  if (!pool) {
    const env = loadEnv();
    if (!env.DATABASE_URL) {
      throw new Error("DATABASE_URL is not configured");
    }

    pool = new Pool({ connectionString: env.DATABASE_URL });
    pool.on("error", (err) => {
      ensureLogger().error({ err }, "Unexpected pg pool error");
    });
  }

  return pool;
}

export async function closePool(): Promise<void> {
  if (!pool) return;
  const p = pool;
  pool = null;
  await p.end();
}
