import { serve } from "@hono/node-server";
import { createApp } from "./app";
import { createAppContainer } from "./be/infra/di";
import { loadConfig } from "./config";
import { CacheServiceUpstash, MemoryCache } from "./lib/cache";
import { setJwtSecret } from "./lib/jwt";
import { setRedisConfig } from "./lib/redis";

// Configuration errors are fatal here, before the server accepts a request
const config = loadConfig();

if (config.jwtSecret) {
  setJwtSecret(config.jwtSecret);
}

if (config.redis) {
  setRedisConfig(config.redis);
}

console.log("[App Init] Environment Check:", {
  CURSOR_TTL: config.settings.cursorTtl ?? "none",
  CHUNK_SIZE: config.settings.chunkSize,
  JWT_SECRET_SET: !!config.jwtSecret,
  REDIS_SET: !!config.redis,
});

const container = createAppContainer({
  settings: config.settings,
  partCache: config.redis ? CacheServiceUpstash : new MemoryCache(),
});

const app = createApp(container, { frontendUrl: config.frontendUrl });

serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.log(`[App Init] Listening on http://localhost:${info.port}`);
});
