// src/state/keys.ts

const PREFIX = "ingest:v1";

const key = (suffix: string) => `${PREFIX}:${suffix}`;

export const uploadKeys = {
  session: (uploadId: string) => key(`upload:${uploadId}:session`),

  lock: (uploadId: string) => key(`upload:${uploadId}:lock`),

  // Reaper index (single source of truth for active sessions)
  gcIndex: () => key("upload:gc:active"),
};

export const catalogKeys = {
  entry: (entryId: string) => key(`catalog:${entryId}`),

  // Uniqueness claim: metadata key -> entry id
  byMetadata: (metadataKey: string) => key(`catalog:meta:${metadataKey}`),

  all: () => key("catalog:all"),
};
