import { Pool } from "pg";

const UNDEFINED_FUNCTION = "42883";

export function createPostgresPool(databaseUrl: string): Pool {
  const pool = new Pool({ connectionString: databaseUrl });
  pool.on("error", (error) => {
    console.error(`[postgres] Idle client error: ${error.message}`);
  });
  return pool;
}

export function isUndefinedFunctionError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === UNDEFINED_FUNCTION
  );
}
