import type { FrameCountTable } from "../types/labeling";
import { formatCsvLine, parseCsvRows } from "./csv";
import { malformedInput } from "./labelingError";

function baseName(filename: string): string {
  return filename.split(/[\\/]/).pop() ?? filename;
}

/**
 * Read the frame counter's `filename,frames` table. Keys are base names, so
 * the table can be matched against discovered files in any directory.
 */
export function parseFrameCounts(csvText: string): FrameCountTable {
  const rows = parseCsvRows(csvText);
  if (rows == null) throw malformedInput("frame count table has an unterminated quote");
  if (rows.length === 0) throw malformedInput("frame count table is empty");

  const header = rows[0].map((h) => h.trim().toLowerCase());
  const nameCol = header.indexOf("filename");
  const framesCol = header.indexOf("frames");
  if (nameCol === -1 || framesCol === -1) {
    throw malformedInput(
      `frame count table header must name "filename" and "frames", got "${rows[0].join(",")}"`,
    );
  }

  const counts = new Map<string, number>();
  for (let i = 1; i < rows.length; i++) {
    const line = i + 1;
    const name = baseName((rows[i][nameCol] ?? "").trim());
    const frames = (rows[i][framesCol] ?? "").trim();
    if (name === "") throw malformedInput(`frame count table line ${line} has no filename`);
    if (!/^\d+$/.test(frames)) {
      throw malformedInput(
        `frame count table line ${line} has invalid frame count "${frames}"`,
      );
    }
    if (counts.has(name)) {
      throw malformedInput(`frame count table lists ${name} more than once`);
    }
    counts.set(name, Number(frames));
  }
  return counts;
}

export function formatFrameCountsCsv(counts: FrameCountTable): string {
  const names = Array.from(counts.keys()).sort();
  const lines = [formatCsvLine(["filename", "frames"])];
  for (const name of names) {
    lines.push(formatCsvLine([name, counts.get(name) ?? 0]));
  }
  return lines.join("\n") + "\n";
}
