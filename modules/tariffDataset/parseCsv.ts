export type CsvRecord = {
  row: number; // 1-based line of the data row in the file (header is row 1)
  values: Record<string, string>;
};

function splitCsvRows(csv: string): Array<{ line: number; cells: string[] }> {
  const rows: Array<{ line: number; cells: string[] }> = [];
  let currentField = "";
  let currentRow: string[] = [];
  let inQuotes = false;
  let line = 1;
  let rowLine = 1;

  for (let i = 0; i < csv.length; i += 1) {
    const char = csv[i];

    if (char === '"') {
      const next = csv[i + 1];
      if (inQuotes && next === '"') {
        currentField += '"';
        i += 1;
      } else {
        inQuotes = !inQuotes;
      }
      continue;
    }

    if (char === "," && !inQuotes) {
      currentRow.push(currentField);
      currentField = "";
      continue;
    }

    if ((char === "\n" || char === "\r") && !inQuotes) {
      if (char === "\r" && csv[i + 1] === "\n") {
        i += 1;
      }
      currentRow.push(currentField);
      if (currentRow.some((cell) => cell.trim().length > 0)) {
        rows.push({ line: rowLine, cells: currentRow });
      }
      line += 1;
      rowLine = line;
      currentRow = [];
      currentField = "";
      continue;
    }

    if (char === "\n") line += 1;
    currentField += char;
  }

  currentRow.push(currentField);
  if (currentRow.some((cell) => cell.trim().length > 0)) {
    rows.push({ line: rowLine, cells: currentRow });
  }

  return rows;
}

// "Zone ID" / "zone-id" / "ZoneId" → "zone_id"
export function sanitizeHeader(key: string): string {
  return key
    .replace(/\u00a0/g, " ")
    .trim()
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .toLowerCase()
    .replace(/[\s\-./()]+/g, "_")
    .replace(/_+/g, "_")
    .replace(/^_|_$/g, "");
}

/**
 * Header row + data rows → keyed records. Lines starting with `#` are comments.
 */
export function parseTariffCsv(csv: string): CsvRecord[] {
  if (!csv) return [];
  const rows = splitCsvRows(csv.replace(/^\uFEFF/, "")).filter((r) => !String(r.cells[0] ?? "").trim().startsWith("#"));
  if (rows.length === 0) return [];

  const header = rows[0].cells.map(sanitizeHeader);
  const out: CsvRecord[] = [];
  for (const r of rows.slice(1)) {
    const values: Record<string, string> = {};
    header.forEach((key, idx) => {
      if (!key) return;
      values[key] = String(r.cells[idx] ?? "").trim();
    });
    out.push({ row: r.line, values });
  }
  return out;
}
