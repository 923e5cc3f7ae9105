/**
 * Minimal RFC 4180 reader/writer for the two small tables this tool exchanges
 * with the outside world (frame counts in, labels out).
 */

export function escapeCsvField(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function formatCsvLine(fields: readonly (string | number)[]): string {
  return fields.map(escapeCsvField).join(",");
}

/**
 * Split CSV text into records. Quoted fields may contain separators, doubled
 * quotes and line breaks. Blank lines are dropped. Returns null on an
 * unterminated quote.
 */
export function parseCsvRows(text: string): string[][] | null {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let inQuotes = false;
  let fieldStarted = false;

  const endRow = () => {
    if (fieldStarted || row.length > 0) {
      row.push(field);
      rows.push(row);
    }
    row = [];
    field = "";
    fieldStarted = false;
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += ch;
      }
      continue;
    }
    if (ch === '"') {
      inQuotes = true;
      fieldStarted = true;
    } else if (ch === ",") {
      row.push(field);
      field = "";
      fieldStarted = true;
    } else if (ch === "\n") {
      endRow();
    } else if (ch === "\r") {
      if (text[i + 1] !== "\n") endRow();
    } else {
      field += ch;
      fieldStarted = true;
    }
  }
  if (inQuotes) return null;
  endRow();
  return rows;
}
