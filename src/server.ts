// src/server.ts
import "dotenv/config";

import { loadConfig } from "./lib/env.js";
import { log, logError } from "./lib/utils.js";
import { LabelStore } from "./store/labels.js";
import { UploadStore } from "./features/uploads.js";
import { createApp } from "./web/server.js";

/* 設定はここで一度だけ読み、各コンポーネントへ渡す */
const config = loadConfig();
const store = new LabelStore(config.databaseFile);
store.init();
const uploads = new UploadStore(config.uploadDir);

const app = createApp({ config, store, uploads });

/* Start */
const server = app.listen(config.port, () => {
  log(`listening :${config.port} db=${config.databaseFile} uploads=${config.uploadDir}`);
  log(`public base url: ${config.publicBaseUrl || "(from request host)"}`);
});

function shutdown(signal: string) {
  log(`${signal} received, shutting down`);
  server.close((err) => {
    store.close();
    if (err) {
      logError("server close failed:", err);
      process.exit(1);
    }
    process.exit(0);
  });
}
process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));
