/**
 * Financial statement upload → year × line-item table.
 *
 * Input is a multi-year CSV with "Statement" and "Item" columns plus one column per year.
 * Values are never summed or zero-filled: duplicate (year, item) pairs keep the first
 * occurrence and non-numeric cells become null.
 */

import Papa from "papaparse";

export type StatementLineItem = {
  statement: string;
  item: string;
  canonical_item: string;
  year: string;
  value: number | null;
};

export type PivotYear = number | string;

export type StatementPivot = {
  years: PivotYear[];
  items: string[];
  rows: Map<PivotYear, Record<string, number | null>>;
};

export type PivotWarnings = {
  duplicate_count: number;
  non_numeric_count: number;
};

export type DataQualitySummary = {
  years: PivotYear[];
  metric_count: number;
  completeness_pct: number;
};

export type StatementPivotResult = {
  pivot: StatementPivot;
  warnings: PivotWarnings;
  quality: DataQualitySummary;
};

const REQUIRED_COLUMNS = ["Statement", "Item"] as const;

/** "Total Current-Assets" → "total_current_assets" */
export function canonicalItemName(item: string): string {
  return item.toLowerCase().replace(/ /g, "_").replace(/-/g, "_");
}

/** Parse a numeric cell; thousands separators are stripped. Blank or non-numeric → null. */
export function parseCellNumber(v: string | null | undefined): number | null {
  if (v == null) return null;
  const cleaned = v.replace(/,/g, "").trim();
  if (!cleaned) return null;
  const n = Number(cleaned);
  return Number.isFinite(n) ? n : null;
}

export type CsvTable = {
  header: string[];
  records: Record<string, string | undefined>[];
};

/** Header row plus one record per non-empty line; headers and cells are trimmed. */
export function readCsvTable(csvText: string): CsvTable {
  const parsed = Papa.parse<Record<string, string | undefined>>(csvText.replace(/^\uFEFF/, ""), {
    header: true,
    skipEmptyLines: "greedy",
    transformHeader: (h) => h.trim(),
    transform: (v) => v.trim(),
  });
  return { header: parsed.meta.fields ?? [], records: parsed.data };
}

/** Melt wide statement rows into one line item per (row, year column). */
export function meltStatements(csvText: string): StatementLineItem[] {
  const { header, records } = readCsvTable(csvText);
  if (!REQUIRED_COLUMNS.every((c) => header.includes(c))) {
    throw new Error("File must contain 'Statement' and 'Item' columns.");
  }
  const yearColumns = header.filter((c) => !REQUIRED_COLUMNS.some((r) => r === c));

  const out: StatementLineItem[] = [];
  for (const rec of records) {
    const item = rec.Item ?? "";
    for (const year of yearColumns) {
      out.push({
        statement: rec.Statement ?? "",
        item,
        canonical_item: canonicalItemName(item),
        year,
        value: parseCellNumber(rec[year]),
      });
    }
  }
  return out;
}

function yearKeys(rawYears: string[]): PivotYear[] {
  const asInts = rawYears.map((y) => (/^-?\d+$/.test(y.trim()) ? Number(y.trim()) : null));
  if (asInts.every((y): y is number => y !== null)) {
    return [...new Set(asInts)].sort((a, b) => a - b);
  }
  return [...new Set(rawYears)].sort();
}

function toYearKey(year: string, numeric: boolean): PivotYear {
  return numeric ? Number(year.trim()) : year;
}

/**
 * Pivot melted line items into year rows × canonical item columns.
 * Returns warnings (duplicates dropped, non-numeric cells) and a data quality summary.
 */
export function pivotStatements(lineItems: StatementLineItem[]): StatementPivotResult {
  const seen = new Set<string>();
  const kept: StatementLineItem[] = [];
  let duplicate_count = 0;
  for (const li of lineItems) {
    const key = `${li.year}\u0000${li.canonical_item}`;
    if (seen.has(key)) {
      duplicate_count += 1;
      continue;
    }
    seen.add(key);
    kept.push(li);
  }

  const non_numeric_count = kept.filter((li) => li.value === null).length;

  const years = yearKeys([...new Set(kept.map((li) => li.year))]);
  const numeric = years.every((y) => typeof y === "number");
  const items = [...new Set(kept.map((li) => li.canonical_item))].sort();

  const rows = new Map<PivotYear, Record<string, number | null>>();
  for (const y of years) {
    const row: Record<string, number | null> = {};
    for (const item of items) row[item] = null;
    rows.set(y, row);
  }
  for (const li of kept) {
    const row = rows.get(toYearKey(li.year, numeric));
    if (row) row[li.canonical_item] = li.value;
  }

  const totalCells = years.length * items.length;
  let nullCells = 0;
  for (const row of rows.values()) {
    for (const item of items) if (row[item] === null) nullCells += 1;
  }
  const completeness_pct = totalCells > 0 ? Math.round((1 - nullCells / totalCells) * 1000) / 10 : 0;

  return {
    pivot: { years, items, rows },
    warnings: { duplicate_count, non_numeric_count },
    quality: { years, metric_count: items.length, completeness_pct },
  };
}

/** Full pipeline: parse CSV text, melt, dedupe, pivot. */
export function buildStatementPivot(csvText: string): StatementPivotResult {
  return pivotStatements(meltStatements(csvText));
}

/** Plain object keyed by year, for JSON output. */
export function pivotToJson(pivot: StatementPivot): Record<string, Record<string, number | null>> {
  const out: Record<string, Record<string, number | null>> = {};
  for (const y of pivot.years) {
    const row = pivot.rows.get(y);
    if (row) out[String(y)] = { ...row };
  }
  return out;
}
