import { Kysely, PostgresDialect } from "kysely";
import { Pool, PoolConfig } from "pg";
import { Database } from "./types";
import { getDatabaseUrl } from "./config";

const LOCAL_HOSTS = new Set(["localhost", "127.0.0.1", "::1"]);

/**
 * Pool settings for a connection string. TLS is used unless `sslmode=disable`
 * is given or the host is local / a docker service name.
 */
export function getPoolConfig(connString?: string): PoolConfig {
  const connectionString = connString ?? getDatabaseUrl();
  const url = new URL(connectionString);
  const sslmode = url.searchParams.get("sslmode");

  let ssl: PoolConfig["ssl"];
  if (sslmode === "disable") {
    ssl = false;
  } else if (sslmode) {
    ssl = { rejectUnauthorized: false };
  } else {
    const local = LOCAL_HOSTS.has(url.hostname) || !url.hostname.includes(".");
    ssl = local ? false : { rejectUnauthorized: false };
  }

  return { connectionString, ssl };
}

/**
 * Open a kysely instance over a pg pool. The caller owns it and must
 * `destroy()` it on shutdown.
 */
export function createDb(connString?: string): Kysely<Database> {
  return new Kysely<Database>({
    dialect: new PostgresDialect({
      pool: new Pool(getPoolConfig(connString)),
    }),
  });
}
