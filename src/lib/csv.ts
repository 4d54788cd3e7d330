export interface CsvTable {
  header: string[];
  /** Column name → raw value, one record per data row. */
  rows: Array<Record<string, string>>;
}

/**
 * Splits CSV text into records of fields. Handles quoted fields, doubled
 * quotes and line breaks inside quotes. Throws on an unterminated quote.
 */
export function parseRecords(text: string, delimiter = ','): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let inQuotes = false;
  let i = 0;

  const endField = (): void => {
    record.push(field);
    field = '';
  };
  const endRecord = (): void => {
    endField();
    records.push(record);
    record = [];
  };

  // Strip a UTF-8 BOM written by spreadsheet exports
  const src = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  while (i < src.length) {
    const ch = src[i];
    if (inQuotes) {
      if (ch === '"') {
        if (src[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
      } else {
        field += ch;
      }
      i++;
      continue;
    }

    if (ch === '"' && field === '') {
      inQuotes = true;
    } else if (ch === delimiter) {
      endField();
    } else if (ch === '\r' && src[i + 1] === '\n') {
      endRecord();
      i++;
    } else if (ch === '\n' || ch === '\r') {
      endRecord();
    } else {
      field += ch;
    }
    i++;
  }

  if (inQuotes) {
    throw new Error(`Malformed CSV: unterminated quoted field in record ${records.length + 1}`);
  }
  if (field !== '' || record.length > 0) {
    endRecord();
  }

  // Blank lines carry no data
  return records.filter((r) => !(r.length === 1 && r[0].trim() === ''));
}

/**
 * Parses CSV text with a header line into keyed rows.
 * Header names are trimmed; values are kept as written. A row with fewer
 * fields than the header throws, naming the 1-based data row and the
 * columns it lacks.
 */
export function parseCsv(text: string, delimiter = ','): CsvTable {
  const records = parseRecords(text, delimiter);
  if (records.length === 0) {
    return { header: [], rows: [] };
  }

  const header = records[0].map((h) => h.trim());
  const rows = records.slice(1).map((fields, idx) => {
    if (fields.length < header.length) {
      const missing = header.slice(fields.length).join(', ');
      throw new Error(`Malformed CSV: row ${idx + 1} is missing columns: ${missing}`);
    }
    const row: Record<string, string> = {};
    header.forEach((name, col) => {
      row[name] = fields[col];
    });
    return row;
  });
  return { header, rows };
}

function quoteField(value: string, delimiter: string): string {
  if (value.includes('"') || value.includes(delimiter) || /[\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** Formats one CSV line, including the trailing line break. */
export function formatCsvRow(fields: ReadonlyArray<string | number>, delimiter = ','): string {
  return fields.map((f) => quoteField(String(f), delimiter)).join(delimiter) + '\r\n';
}
