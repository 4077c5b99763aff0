import type { SheetRow } from "../plan/plan-schema.js";

const FETCH_TIMEOUT_MS = 20_000;

export interface SheetTabs {
  sheetId: string;
  gidPlan: string;
  gidMacros: string;
  gidCycle: string;
}

export interface PlanTables {
  planRows: SheetRow[];
  macroRows: SheetRow[];
  cycleRows: SheetRow[];
}

/**
 * Accepts a full spreadsheet URL or a bare id.
 * "https://docs.google.com/spreadsheets/d/<id>/edit#gid=0" → "<id>"
 */
export function extractSheetId(value: string): string | null {
  const trimmed = value.trim();
  if (!trimmed) return null;
  const match = /\/d\/([^/?#]+)/.exec(trimmed);
  if (match) return match[1];
  return trimmed.includes("/") ? null : trimmed;
}

export function sheetCsvUrl(sheetId: string, gid: string): string {
  return `https://docs.google.com/spreadsheets/d/${encodeURIComponent(sheetId)}/export?format=csv&gid=${encodeURIComponent(gid)}`;
}

/**
 * Parses CSV text (RFC 4180: quoted fields, doubled quotes, CRLF or LF) into
 * rows keyed by the trimmed header cells.
 */
export function parseCsv(text: string): SheetRow[] {
  const records: string[][] = [];
  let field = "";
  let record: string[] = [];
  let inQuotes = false;
  const source = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  for (let i = 0; i < source.length; i++) {
    const ch = source[i];
    if (inQuotes) {
      if (ch === '"') {
        if (source[i + 1] === '"') {
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
    } else if (ch === ",") {
      record.push(field);
      field = "";
    } else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && source[i + 1] === "\n") i++;
      record.push(field);
      records.push(record);
      record = [];
      field = "";
    } else {
      field += ch;
    }
  }
  if (field !== "" || record.length > 0) {
    record.push(field);
    records.push(record);
  }

  const [header, ...body] = records;
  if (!header) return [];
  const keys = header.map(h => h.trim());
  return body.map(cells =>
    Object.fromEntries(
      keys.flatMap((key, idx): Array<[string, string | undefined]> => (key ? [[key, cells[idx]]] : []))
    )
  );
}

export async function fetchSheetRows(url: string, fetchImpl: typeof fetch = fetch): Promise<SheetRow[]> {
  const res = await fetchImpl(url, { signal: AbortSignal.timeout(FETCH_TIMEOUT_MS) });
  if (!res.ok) {
    throw new Error(`Sheet export failed with HTTP ${res.status} for ${url}`);
  }
  return parseCsv(await res.text());
}

export async function fetchPlanTables(tabs: SheetTabs, fetchImpl: typeof fetch = fetch): Promise<PlanTables> {
  const [planRows, macroRows, cycleRows] = await Promise.all([
    fetchSheetRows(sheetCsvUrl(tabs.sheetId, tabs.gidPlan), fetchImpl),
    fetchSheetRows(sheetCsvUrl(tabs.sheetId, tabs.gidMacros), fetchImpl),
    fetchSheetRows(sheetCsvUrl(tabs.sheetId, tabs.gidCycle), fetchImpl),
  ]);
  return { planRows, macroRows, cycleRows };
}
