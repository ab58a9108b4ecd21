// src/state/gc/upload.gc.worker.ts

import crypto from "crypto";
import { setImmediate as yieldToLoop } from "timers/promises";

import { abortUploadSession } from "../../services/upload/upload.cancel.js";
import type { IngestDeps } from "../../services/upload/upload.deps.js";
import { ACTIVE_UPLOAD_STATES } from "../../types/upload.js";

export interface ReaperReport {
  scanned: number;
  dropped: number;
  aborted: number;
  locked: number;
  failed: number;
}

/**
 * One sweep over the active index. Sessions idle past the TTL are aborted;
 * sessions under a finalize lock are never touched.
 */
export async function runUploadReaper(deps: IngestDeps, now = Date.now()): Promise<ReaperReport> {
  const { sessions, settings, log } = deps;
  const ttlMs = settings.upload.sessionTtlMs;
  const report: ReaperReport = { scanned: 0, dropped: 0, aborted: 0, locked: 0, failed: 0 };

  /**
   * SINGLE SOURCE OF TRUTH:
   * the reaper only considers uploads registered here.
   */
  const uploadIds = await sessions.listActive();

  for (const uploadId of uploadIds) {
    report.scanned++;

    const session = await sessions.get(uploadId);
    if (!session || !ACTIVE_UPLOAD_STATES.has(session.state)) {
      await sessions.removeFromIndex(uploadId);
      report.dropped++;
      continue;
    }

    if (now - session.lastActivityAt < ttlMs) continue;

    const token = crypto.randomUUID();
    const acquired = await sessions.acquireLock(uploadId, token, settings.finalize.lockTtlSeconds);
    if (!acquired) {
      report.locked++;
      continue;
    }

    try {
      // Re-read under the lock; a chunk may have landed meanwhile.
      const fresh = await sessions.get(uploadId);
      if (
        fresh &&
        ACTIVE_UPLOAD_STATES.has(fresh.state) &&
        now - fresh.lastActivityAt >= ttlMs
      ) {
        log.warn(
          { uploadId, state: fresh.state, idleMs: now - fresh.lastActivityAt },
          "Reaping stale upload"
        );
        await abortUploadSession(deps, fresh, "expired after inactivity");
        report.aborted++;
      }
    } catch (err) {
      report.failed++;
      log.error({ uploadId, err }, "Failed to reap stale upload");
    } finally {
      await sessions.releaseLock(uploadId, token);
    }

    // Yield between sessions when the backlog is large.
    await yieldToLoop();
  }

  return report;
}
