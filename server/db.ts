import pg from "pg";
import type { DatabaseSettings } from "./config/app-config.js";
import { loggers } from "./utils/logger.js";

const logger = loggers.db;

export function toClientConfig(settings: DatabaseSettings): pg.ClientConfig {
  return {
    host: settings.host,
    port: settings.port,
    database: settings.database,
    user: settings.user,
    password: settings.password,
  };
}

/**
 * One client per call; nothing is pooled between exports.
 */
export function createClient(settings: DatabaseSettings): pg.Client {
  const client = new pg.Client(toClientConfig(settings));
  client.on("error", (err: Error) => {
    logger.error("Unexpected client error", err);
  });
  return client;
}

export async function withClient<T>(
  settings: DatabaseSettings,
  fn: (client: pg.Client) => Promise<T>,
): Promise<T> {
  const client = createClient(settings);
  await client.connect();
  try {
    return await fn(client);
  } finally {
    await client.end();
  }
}

export async function verifyConnection(settings: DatabaseSettings): Promise<void> {
  await withClient(settings, async (client) => {
    const result = await client.query<{ now: Date }>("SELECT NOW() AS now");
    logger.info(`Connected to PostgreSQL at ${result.rows[0].now}`, {
      host: settings.host,
      database: settings.database,
    });
  });
}
