// src/state/gc/upload.gc.reconcile.ts

import fs from "fs/promises";
import path from "path";

import type { IngestDeps } from "../../services/upload/upload.deps.js";
import { ACTIVE_UPLOAD_STATES } from "../../types/upload.js";

function isUuid(value: string): boolean {
  return /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i.test(
    value
  );
}

/**
 * Startup pass: drops index members that no longer have an active session
 * and removes conversion workdirs left behind by a crashed process.
 */
export async function reconcileUploads(deps: IngestDeps): Promise<{ dropped: number; orphanDirs: number }> {
  const { sessions, settings, log } = deps;
  let dropped = 0;
  let orphanDirs = 0;

  const active = new Set<string>();
  for (const uploadId of await sessions.listActive()) {
    const session = await sessions.get(uploadId);
    if (!session || !ACTIVE_UPLOAD_STATES.has(session.state)) {
      await sessions.removeFromIndex(uploadId);
      dropped++;
      continue;
    }
    active.add(uploadId);
  }

  let entries: string[];
  try {
    entries = await fs.readdir(settings.upload.tmpDir);
  } catch (err) {
    log.warn({ err, tmpDir: settings.upload.tmpDir }, "Upload tmp dir unreadable; skipping workdir cleanup");
    entries = [];
  }

  for (const entry of entries) {
    if (!isUuid(entry)) continue;

    // A finalize on another instance may own this workdir.
    if (await sessions.isLocked(entry)) continue;
    if (active.has(entry)) continue;

    log.warn({ uploadId: entry }, "Removing orphan conversion workdir");
    await fs.rm(path.join(settings.upload.tmpDir, entry), { recursive: true, force: true });
    orphanDirs++;
  }

  if (dropped || orphanDirs) {
    log.info({ dropped, orphanDirs }, "Upload reconciliation finished");
  }
  return { dropped, orphanDirs };
}
