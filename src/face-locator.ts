// ─── Face Locator Capability ────────────────────────────────────────────────────
// The face detector runs outside this service. The pipeline only needs
// zero-or-more bounding regions per frame; an empty list is a valid result.

import type { BoundingRegion } from "./types.js";
import type { ImageBuffer } from "./image-buffer.js";

export interface FaceLocator {
  locate(frame: ImageBuffer): Promise<readonly BoundingRegion[]> | readonly BoundingRegion[];
}

/**
 * Uses regions that arrived together with the frame (a detector running next
 * to the camera sends them in the frame header). Frames without hints have no faces.
 */
export class FrameHintFaceLocator implements FaceLocator {
  private readonly hints = new WeakMap<ImageBuffer, readonly BoundingRegion[]>();

  attach(frame: ImageBuffer, regions: readonly BoundingRegion[]): void {
    this.hints.set(frame, regions);
  }

  locate(frame: ImageBuffer): readonly BoundingRegion[] {
    return this.hints.get(frame) ?? [];
  }
}

/** Treats the whole frame as one face. For clients that send pre-cropped faces. */
export class FullFrameFaceLocator implements FaceLocator {
  locate(frame: ImageBuffer): readonly BoundingRegion[] {
    return [{ x: 0, y: 0, width: frame.width, height: frame.height }];
  }
}
