// src/state/keys.ts

const PREFIX = "chunkline:v1";

const key = (suffix: string) => `${PREFIX}:${suffix}`;

export const uploadKeys = {
  session: (uploadId: string) => key(`upload:${uploadId}:session`),

  // Tombstone written at completion; replaces the session hash.
  completed: (uploadId: string) => key(`upload:${uploadId}:completed`),
};
