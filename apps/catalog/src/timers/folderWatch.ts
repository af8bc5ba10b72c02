/**
 * Periodic folder refresh.
 *
 * Optional complement to syncing on every listing: when
 * SYNC_INTERVAL_MS is set, the beats folder is rescanned on a timer.
 * A run that is still in progress when the next tick fires is not
 * overlapped; that tick is skipped.
 */

import type { SyncReport } from "../services/folderSync.js";

export interface FolderWatchOptions {
  intervalMs: number;
  sync: () => Promise<SyncReport>;
}

export interface FolderWatch {
  stop(): void;
}

/**
 * Start rescanning on an interval. Returns null when the interval is 0.
 */
export function startFolderWatch(options: FolderWatchOptions): FolderWatch | null {
  if (options.intervalMs <= 0) {
    return null;
  }

  let running = false;

  const timer = setInterval(() => {
    if (running) {
      return;
    }
    running = true;
    options
      .sync()
      .catch((error: unknown) => {
        console.error("[folder-watch] sync failed:", error);
      })
      .finally(() => {
        running = false;
      });
  }, options.intervalMs);

  timer.unref();
  console.log(`[folder-watch] started, intervalMs=${options.intervalMs}`);

  return {
    stop() {
      clearInterval(timer);
      console.log(`[folder-watch] stopped`);
    },
  };
}
