// ─── Track Library ──────────────────────────────────────────────────────────────
// Resolves an emotion to an audio track on disk.
//
// Layout:
//   <root>/<emotion>/set1/*.{mp3,wav,ogg}   primary set
//   <root>/<emotion>/set2/*.{mp3,wav,ogg}   secondary set
//   <root>/default/<emotion>.{mp3,wav,ogg}  fallback when the set folder is empty
//
// Emotion folder names are lowercase. Scanning is async and happens once (or on
// rescan); resolve() is synchronous so the scheduler can call play() inline.

import { readdir } from "node:fs/promises";
import path from "node:path";
import type { EmotionLabel } from "./types.js";
import { EMOTION_LABELS } from "./emotion-labels.js";
import { createLogger, errorMessage, type Logger } from "./logger.js";

export const TRACK_EXTENSIONS = [".mp3", ".wav", ".ogg"] as const;

export const PRIMARY_SET = "set1";
export const SECONDARY_SET = "set2";
export const DEFAULT_FOLDER = "default";

export interface ResolvedTrack {
  /** Absolute path on disk. */
  filePath: string;
  /** URL path under the static tracks mount, e.g. "/tracks/happiness/set1/a.mp3". */
  url: string;
  /** True for a track from an emotion set, false for the default fallback. */
  fromSet: boolean;
}

interface EmotionTracks {
  primary: string[];
  secondary: string[];
  fallback: string | null;
}

export interface TrackLibraryOptions {
  root: string;
  /** URL prefix the root is served under. Default: "/tracks" */
  urlPrefix?: string;
  /** Returns a float in [0, 1). Default: Math.random */
  random?: () => number;
  logger?: Logger;
}

function isTrackFile(name: string): boolean {
  const ext = path.extname(name).toLowerCase();
  return TRACK_EXTENSIONS.some((allowed) => allowed === ext);
}

async function listTracks(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && isTrackFile(entry.name))
      .map((entry) => entry.name)
      .sort();
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return [];
    }
    throw err;
  }
}

export class TrackLibrary {
  readonly root: string;
  private readonly urlPrefix: string;
  private readonly random: () => number;
  private readonly logger: Logger;
  private index = new Map<EmotionLabel, EmotionTracks>();

  constructor(options: TrackLibraryOptions) {
    this.root = path.resolve(options.root);
    this.urlPrefix = (options.urlPrefix ?? "/tracks").replace(/\/+$/, "");
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? createLogger("TrackLibrary");
  }

  /** Reads the directory tree. Missing folders count as empty. Returns the number of tracks indexed. */
  async scan(): Promise<number> {
    const next = new Map<EmotionLabel, EmotionTracks>();
    const defaults = await listTracks(path.join(this.root, DEFAULT_FOLDER));
    let total = 0;

    for (const label of EMOTION_LABELS) {
      const folder = label.toLowerCase();
      const primary = await listTracks(path.join(this.root, folder, PRIMARY_SET));
      const secondary = await listTracks(path.join(this.root, folder, SECONDARY_SET));
      const fallback = TRACK_EXTENSIONS
        .map((ext) => `${folder}${ext}`)
        .find((name) => defaults.includes(name)) ?? null;

      next.set(label, { primary, secondary, fallback });
      total += primary.length + secondary.length + (fallback ? 1 : 0);
    }

    this.index = next;
    this.logger.info(`Indexed ${total} tracks under ${this.root}`);
    return total;
  }

  /** scan() that logs instead of throwing. Keeps the previous index on failure. */
  async rescan(): Promise<boolean> {
    try {
      await this.scan();
      return true;
    } catch (err) {
      this.logger.error(`Track scan failed: ${errorMessage(err)}`);
      return false;
    }
  }

  /** Picks a random track from the chosen set, else the default fallback, else null. */
  resolve(label: EmotionLabel, usesPrimarySet: boolean): ResolvedTrack | null {
    const tracks = this.index.get(label);
    if (!tracks) return null;

    const folder = label.toLowerCase();
    const setName = usesPrimarySet ? PRIMARY_SET : SECONDARY_SET;
    const candidates = usesPrimarySet ? tracks.primary : tracks.secondary;

    if (candidates.length > 0) {
      const pick = Math.min(candidates.length - 1, Math.floor(this.random() * candidates.length));
      const name = candidates[pick];
      return {
        filePath: path.join(this.root, folder, setName, name),
        url: `${this.urlPrefix}/${folder}/${setName}/${encodeURIComponent(name)}`,
        fromSet: true,
      };
    }

    if (tracks.fallback) {
      return {
        filePath: path.join(this.root, DEFAULT_FOLDER, tracks.fallback),
        url: `${this.urlPrefix}/${DEFAULT_FOLDER}/${encodeURIComponent(tracks.fallback)}`,
        fromSet: false,
      };
    }

    return null;
  }
}
