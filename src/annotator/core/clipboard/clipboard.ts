import type { Annotation, AnnotationSnapshot, Point } from "../model/types";
import { cloneWithAnchor, snapshotOf } from "../model/annotation";
import type { TextMeasurer } from "../text/textMetrics";

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  const values: unknown[] = Object.values(obj);
  for (const v of values) {
    if (v && typeof v === "object" && !Object.isFrozen(v)) deepFreeze(v);
  }
  return Object.freeze(obj);
}

/** One-slot clipboard. The snapshot never aliases a live annotation. */
export class Clipboard {
  private snapshot: Readonly<AnnotationSnapshot> | null = null;

  get isEmpty() {
    return this.snapshot === null;
  }

  peek(): Readonly<AnnotationSnapshot> | null {
    return this.snapshot;
  }

  copy(annotation: Annotation) {
    this.snapshot = deepFreeze(snapshotOf(annotation));
  }

  clear() {
    this.snapshot = null;
  }

  /** New annotation re-anchored at `point`, or `null` when nothing was copied. */
  paste(point: Point, id: string, measure: TextMeasurer): Annotation | null {
    if (!this.snapshot) return null;
    return cloneWithAnchor(this.snapshot, point, id, measure);
  }
}
