/**
 * Shared Redis client for the execution queue. initRedis(redisUrl) creates it
 * once per process; later calls with the same URL return the same client.
 */
import createDebug from "debug";
import { Redis } from "ioredis";

const debug = createDebug("playforge:redis");

let client: Redis | null = null;
let currentUrl = "";

/** Required by BullMQ for blocking commands. */
const DEFAULT_OPTIONS: { maxRetriesPerRequest: null } = {
  maxRetriesPerRequest: null,
};

/**
 * Return the shared Redis client for redisUrl, creating it on first use. A
 * different URL replaces the client.
 */
export function initRedis(redisUrl: string): Redis {
  const url = redisUrl.trim();
  if (url === currentUrl && client) return client;
  if (!url) throw new Error("REDIS_URL is empty");
  if (client) client.disconnect();
  currentUrl = url;
  const created = new Redis(url, { ...DEFAULT_OPTIONS });
  created.on("error", (err) => {
    debug("Redis connection error: %o", err);
  });
  client = created;
  return created;
}

/**
 * Wait for the shared Redis client to be in "ready" state. Rejects after
 * timeoutMs if the connection doesn't become ready.
 */
export function waitForRedis(timeoutMs = 10_000): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!client) return reject(new Error("Redis not initialized"));
    if (client.status === "ready") return resolve();
    const timer = setTimeout(() => {
      reject(
        new Error(
          `Redis not ready after ${timeoutMs}ms (status: ${client?.status})`,
        ),
      );
    }, timeoutMs);
    client.once("ready", () => {
      clearTimeout(timer);
      resolve();
    });
    client.once("error", (err) => {
      clearTimeout(timer);
      reject(err);
    });
  });
}

/**
 * Close the shared client. Call on process shutdown.
 */
export async function closeRedis(): Promise<void> {
  if (client) {
    await client.quit();
    client = null;
  }
  currentUrl = "";
}
