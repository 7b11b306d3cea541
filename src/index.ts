import { serve } from "@hono/node-server";

import { loadConfig } from "./config";
import { createDb } from "./db";
import { createDetectionStore } from "./db/queries";
import type { DetectionStore } from "./db/queries";
import { createApp } from "./app";
import { resolveConfig } from "./plates";

const config = loadConfig();

// Fail on bad recognizer defaults at boot, not on the first request.
resolveConfig(config.recognizer);

let store: DetectionStore | undefined;
if (config.databaseUrl) {
  const { db } = createDb(config.databaseUrl);
  store = createDetectionStore(db);
} else {
  console.warn("DATABASE_URL is not set; detections will not be persisted.");
}

const app = createApp({
  store,
  defaults: config.recognizer,
  corsOrigin: config.corsOrigin,
});

serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.log(`Server is running on port ${info.port}`);
});
