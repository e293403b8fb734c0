// Serialization cache for the accelerated binding.
// One file per model fingerprint: <fingerprint>.optimized.onnx. Entries for any
// other fingerprint are stale and removed when the cache is prepared.

import { createHash } from "node:crypto";
import { mkdir, readFile, readdir, rm } from "node:fs/promises";
import { join } from "node:path";

const ENTRY_SUFFIX = ".optimized.onnx";

export interface SerializationEntry {
  /** Where the accelerated binding writes its optimized model. */
  optimizedModelPath: string;
  /** Previously written optimized model for this fingerprint, if present. */
  cachedModel: Uint8Array | null;
}

/** SHA-256 hex digest of the model payload. */
export function modelFingerprint(modelBytes: Uint8Array): string {
  return createHash("sha256").update(modelBytes).digest("hex");
}

export class SerializationCache {
  constructor(private readonly directory: string) {}

  entryPath(fingerprint: string): string {
    return join(this.directory, `${fingerprint}${ENTRY_SUFFIX}`);
  }

  /**
   * Ensures the directory exists, drops entries that belong to other
   * fingerprints, and returns the entry for `fingerprint`.
   */
  async prepare(fingerprint: string): Promise<SerializationEntry> {
    await mkdir(this.directory, { recursive: true });

    const names = await readdir(this.directory);
    const target = `${fingerprint}${ENTRY_SUFFIX}`;
    for (const name of names) {
      if (name.endsWith(ENTRY_SUFFIX) && name !== target) {
        await rm(join(this.directory, name), { force: true });
      }
    }

    const optimizedModelPath = this.entryPath(fingerprint);
    let cachedModel: Uint8Array | null = null;
    if (names.includes(target)) {
      const bytes = await readFile(optimizedModelPath);
      cachedModel = bytes.length > 0 ? new Uint8Array(bytes) : null;
    }
    return { optimizedModelPath, cachedModel };
  }

  /** Removes the entry for `fingerprint`, if any. */
  async invalidate(fingerprint: string): Promise<void> {
    await rm(this.entryPath(fingerprint), { force: true });
  }
}
