// Emotion label vocabulary shared by the pipeline, aggregator and playback.
// Index order matches the classifier's output layout and must not change.

export const EMOTION_LABELS = [
  "Neutral",
  "Happiness",
  "Surprise",
  "Anger",
  "Sadness",
  "Disgust",
  "Fear",
  "Contempt",
] as const;

export type EmotionLabel = (typeof EMOTION_LABELS)[number];

/** Number of class scores the classifier emits. */
export const EMOTION_CLASS_COUNT = EMOTION_LABELS.length;

const LABEL_SET: ReadonlySet<string> = new Set(EMOTION_LABELS);

/** Returns true if the value is one of the eight supported labels (exact, case-sensitive). */
export function isEmotionLabel(value: unknown): value is EmotionLabel {
  return typeof value === "string" && LABEL_SET.has(value);
}

/** Label for a classifier output index, or null when the index is out of range. */
export function labelAt(index: number): EmotionLabel | null {
  if (!Number.isInteger(index) || index < 0 || index >= EMOTION_LABELS.length) {
    return null;
  }
  return EMOTION_LABELS[index];
}
