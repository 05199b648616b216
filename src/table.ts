import { parseHTML } from "linkedom";
import { canonicalize, normalize, stripFootnoteMarkers } from "./text";

/**
 * A parsed table: one header row plus data rows of plain strings.
 * Rows may be ragged; a missing cell reads as "".
 */
export interface DataTable {
  /** Position among all tables of the source page */
  index: number;
  headers: string[];
  rows: string[][];
  /** Nearest preceding h2 heading, "" if none */
  section: string;
  /** Nearest h3/h4 heading after that h2, "" if none */
  subsection: string;
}

export function createTable(
  headers: string[],
  rows: string[][],
  extra: Partial<Omit<DataTable, "headers" | "rows">> = {},
): DataTable {
  return {
    index: extra.index ?? 0,
    headers,
    rows,
    section: extra.section ?? "",
    subsection: extra.subsection ?? "",
  };
}

/**
 * Index of the first header matching `predicate` on its canonical text
 */
export function findColumn(
  table: DataTable,
  predicate: (canonicalHeader: string) => boolean,
): number {
  return table.headers.findIndex((header) => predicate(canonicalize(header)));
}

/**
 * Case-insensitive header lookup; "Gold" and "gold" both resolve.
 */
export function columnIndex(table: DataTable, name: string): number {
  const wanted = canonicalize(name);
  return findColumn(table, (header) => header === wanted);
}

export function cellAt(row: readonly string[], column: number): string {
  if (column < 0) return "";
  return row[column] ?? "";
}

export function headerSet(table: DataTable): Set<string> {
  return new Set(table.headers.map((header) => canonicalize(header)));
}

/**
 * Parse every <table> of an HTML document, expanding rowspan/colspan so
 * each row has one string per column.
 */
export function parseTables(html: string): DataTable[] {
  const { document } = parseHTML(html);
  const tables: DataTable[] = [];
  let section = "";
  let subsection = "";

  const elements = Array.from(document.querySelectorAll("h2, h3, h4, table"));
  for (const element of elements) {
    const tag = element.tagName.toUpperCase();
    if (tag === "H2") {
      section = headingText(element);
      subsection = "";
      continue;
    }
    if (tag === "H3" || tag === "H4") {
      subsection = headingText(element);
      continue;
    }

    const rows = Array.from(element.querySelectorAll("tr")).filter(
      (row) => row.closest("table") === element,
    );
    const grid = expandGrid(rows);
    const headerRow = grid.findIndex((row) => row.allHeaders);
    const headerIndex = headerRow === -1 ? 0 : headerRow;

    tables.push({
      index: tables.length,
      headers: grid[headerIndex]?.cells ?? [],
      rows: grid.slice(headerIndex + 1).map((row) => row.cells),
      section,
      subsection,
    });
  }

  return tables;
}

interface GridRow {
  cells: string[];
  allHeaders: boolean;
}

interface PendingSpan {
  text: string;
  remaining: number;
}

function expandGrid(rows: Element[]): GridRow[] {
  const pending: Array<PendingSpan | undefined> = [];
  const grid: GridRow[] = [];

  for (const row of rows) {
    const cells = Array.from(row.children).filter((cell) => {
      const tag = cell.tagName.toUpperCase();
      return tag === "TD" || tag === "TH";
    });
    if (cells.length === 0) continue;

    const out: string[] = [];
    let column = 0;

    const fillSpans = () => {
      let span = pending[column];
      while (span && span.remaining > 0) {
        out[column] = span.text;
        span.remaining--;
        column++;
        span = pending[column];
      }
    };

    for (const cell of cells) {
      fillSpans();
      const text = normalize(cellText(cell));
      const colspan = spanAttribute(cell, "colspan");
      const rowspan = spanAttribute(cell, "rowspan");
      for (let i = 0; i < colspan; i++) {
        out[column] = text;
        pending[column] =
          rowspan > 1 ? { text, remaining: rowspan - 1 } : undefined;
        column++;
      }
    }

    for (; column < pending.length; column++) {
      const span = pending[column];
      if (span && span.remaining > 0) {
        out[column] = span.text;
        span.remaining--;
      }
    }

    grid.push({
      cells: Array.from(out, (value) => value ?? ""),
      allHeaders: cells.every((cell) => cell.tagName.toUpperCase() === "TH"),
    });
  }

  return grid;
}

function spanAttribute(cell: Element, name: string): number {
  const value = parseInt(cell.getAttribute(name) || "1", 10);
  return Number.isFinite(value) && value > 0 ? Math.min(value, 1000) : 1;
}

function headingText(element: Element): string {
  return normalize(stripFootnoteMarkers(cellText(element)));
}

// Formatting tags keep their text glued to the neighbours; every other
// element (links, spans, <br>) is treated as a word break, so
// "<a>Allmen</a><br><a>Switzerland</a>" reads "Allmen Switzerland".
const INLINE_TAGS = new Set(["B", "I", "EM", "STRONG", "U", "SMALL", "ABBR"]);
const SKIPPED_TAGS = new Set(["STYLE", "SCRIPT", "NOSCRIPT"]);

function cellText(node: Node): string {
  const parts: string[] = [];

  const walk = (current: Node) => {
    for (const child of Array.from(current.childNodes)) {
      if (child.nodeType === TEXT_NODE) {
        parts.push(child.textContent ?? "");
        continue;
      }
      if (!isElement(child)) continue;

      const tag = child.tagName.toUpperCase();
      if (SKIPPED_TAGS.has(tag) || isHidden(child)) continue;
      if (INLINE_TAGS.has(tag)) {
        walk(child);
      } else {
        parts.push(" ");
        walk(child);
        parts.push(" ");
      }
    }
  };

  walk(node);
  return parts.join("");
}

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

// Sort keys hidden with display:none would otherwise leak into the text
function isHidden(element: Element): boolean {
  const style = (element.getAttribute("style") || "").replace(/\s+/g, "");
  return style.toLowerCase().includes("display:none");
}
