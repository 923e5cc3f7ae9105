export type LabelingErrorKind =
  | "MalformedInput"
  | "UnalignedEvent"
  | "SegmentExhausted";

/**
 * Raised for upstream data defects found while building timelines or
 * aligning events. Never retried: the run produces no label table.
 */
export class LabelingError extends Error {
  readonly kind: LabelingErrorKind;

  constructor(kind: LabelingErrorKind, message: string) {
    super(message);
    this.name = "LabelingError";
    this.kind = kind;
  }
}

export function malformedInput(message: string): LabelingError {
  return new LabelingError("MalformedInput", message);
}

export function isLabelingError(err: unknown): err is LabelingError {
  return err instanceof LabelingError;
}
