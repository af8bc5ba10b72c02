import dotenv from "dotenv";
import { fileURLToPath } from "url";
import { dirname, resolve } from "path";

// Load environment variables from .env.local, then .env
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
dotenv.config({ path: resolve(__dirname, "../.env.local") });
dotenv.config({ path: resolve(__dirname, "../.env") });

import { createServer } from "http";
import { mkdir } from "fs/promises";
import { VERSION } from "@beat-catalog/shared";
import { loadConfig } from "./config.js";
import { CatalogStore } from "./db/catalogStore.js";
import { CatalogService } from "./services/catalog.js";
import { createRequestListener } from "./http/api.js";
import { startFolderWatch } from "./timers/folderWatch.js";

const config = loadConfig();

// Ensure beats folder exists
try {
  await mkdir(config.beatsFolder, { recursive: true });
} catch (error) {
  console.warn(`[catalog] could not create beats folder ${config.beatsFolder}:`, error);
}

const store = new CatalogStore({ path: config.databasePath });
store.initialize();

const catalog = new CatalogService({
  store,
  beatsFolder: config.beatsFolder,
  syncOnList: config.syncOnList,
});

const httpServer = createServer(
  createRequestListener({ catalog, beatsFolder: config.beatsFolder })
);

const folderWatch = startFolderWatch({
  intervalMs: config.syncIntervalMs,
  sync: () => catalog.syncNow(),
});

function shutdown(signal: string): void {
  console.log(`[catalog] ${signal} received, shutting down`);
  folderWatch?.stop();
  httpServer.close(() => {
    store.close();
    console.log("[catalog] server stopped");
    process.exit(0);
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

httpServer.listen(config.port, () => {
  console.log(`[catalog] server listening on port ${config.port}`);
  console.log(`[catalog] shared package version: ${VERSION}`);
  console.log(`[catalog] beats folder: ${resolve(config.beatsFolder)}`);
  console.log(`[catalog] database: ${resolve(config.databasePath)}`);
  console.log(`[catalog] sync on list: ${config.syncOnList}, interval: ${config.syncIntervalMs}ms`);
});
