export type CsvRow = Record<string, string>;

export interface ParsedCsv {
  headers: string[];
  rows: CsvRow[];
}

/**
 * Minimal RFC 4180 reader: quoted fields, doubled quotes, CRLF.
 * Header names are trimmed; blank lines are dropped.
 */
export function parseCsv(text: string): ParsedCsv {
  const headers: string[] = [];
  const rows: CsvRow[] = [];
  let field = "";
  let current: string[] = [];
  let insideQuotes = false;

  const pushField = () => {
    current.push(field);
    field = "";
  };

  const pushRow = () => {
    const blank = current.every((value) => value.trim() === "");
    if (!blank) {
      if (headers.length === 0) {
        headers.push(...current.map((value) => value.trim()));
      } else {
        const row: CsvRow = {};
        headers.forEach((header, index) => {
          row[header] = current[index] ?? "";
        });
        rows.push(row);
      }
    }
    current = [];
  };

  const source = text.replace(/^\uFEFF/, "");
  for (let i = 0; i < source.length; i++) {
    const char = source[i];
    const next = source[i + 1];
    if (char === '"') {
      if (insideQuotes && next === '"') {
        field += '"';
        i++;
      } else {
        insideQuotes = !insideQuotes;
      }
      continue;
    }
    if (char === "," && !insideQuotes) {
      pushField();
      continue;
    }
    if ((char === "\n" || char === "\r") && !insideQuotes) {
      pushField();
      pushRow();
      if (char === "\r" && next === "\n") i++;
      continue;
    }
    field += char;
  }

  if (field || current.length) {
    pushField();
    pushRow();
  }

  return { headers, rows };
}

export function escapeCsv(value: string): string {
  if (value.includes(",") || value.includes('"') || value.includes("\n")) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}
