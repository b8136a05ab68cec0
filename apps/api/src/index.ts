import "dotenv/config";
import { createApp } from "./app";
import { createRouter } from "./agents";
import { createCache, createRedis } from "./services/cache";
import { DocumentStore } from "./services/documents";
import { env } from "./services/env";
import { createLogger } from "./services/log";
import { createRateLimiter } from "./services/rateLimit";

const log = createLogger("server");

const redis = createRedis();

const app = createApp({
  router: createRouter({ cache: createCache(redis) }),
  documents: new DocumentStore(),
  rateLimit: createRateLimiter({ limit: env.RATE_LIMIT_PER_MINUTE, redis }),
  corsOrigin: env.CORS_ORIGIN
});

app.listen(Number(env.PORT), () => {
  log.info(`API listening on http://localhost:${env.PORT}`);
});
