// src/state/gc/upload.gc.scheduler.ts

import type { IngestDeps } from "../../services/upload/upload.deps.js";
import { runUploadReaper } from "./upload.gc.worker.js";

let timer: NodeJS.Timeout | null = null;
let running: Promise<void> | null = null;

export function startUploadReaper(deps: IngestDeps) {
  if (timer) return;

  const { log } = deps;
  log.info({ intervalMs: deps.settings.reaper.intervalMs }, "Upload reaper started");

  timer = setInterval(() => {
    if (running) return; // prevent overlap

    running = runUploadReaper(deps)
      .then((report) => {
        if (report.aborted || report.dropped || report.failed) {
          log.info({ report }, "Upload reaper sweep finished");
        }
      })
      .catch((err) => {
        log.error({ err }, "Upload reaper failed");
      })
      .finally(() => {
        running = null;
      });
  }, deps.settings.reaper.intervalMs);

  timer.unref();
}

export async function stopUploadReaper(): Promise<void> {
  if (timer) {
    clearInterval(timer);
    timer = null;
  }

  if (running) {
    await running;
    running = null;
  }
}
