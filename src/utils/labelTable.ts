import type { LabelRow } from "../types/labeling";
import { formatCsvLine } from "./csv";

export const LABEL_CSV_HEADER = ["filename", "class", "start frame", "end frame"];

/** Stable sort by filename; rows for one file keep their emission order. */
export function assembleLabelTable(rows: readonly LabelRow[]): LabelRow[] {
  return [...rows].sort((a, b) =>
    a.filename < b.filename ? -1 : a.filename > b.filename ? 1 : 0,
  );
}

export function formatLabelCsv(rows: readonly LabelRow[]): string {
  const lines = [formatCsvLine(LABEL_CSV_HEADER)];
  for (const row of rows) {
    lines.push(
      formatCsvLine([row.filename, row.className, row.startFrame, row.endFrame]),
    );
  }
  return lines.join("\n") + "\n";
}
