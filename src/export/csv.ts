/**
 * Delimited Text Encoding
 *
 * Comma-separated values with RFC 4180 quoting. Fields containing a
 * comma, quote or line break are wrapped in quotes with inner quotes
 * doubled; rows end with `\n`.
 *
 * @module export/csv
 */

/**
 * Raised for input that is not well-formed CSV.
 */
export class CsvParseError extends Error {
  constructor(
    message: string,
    public readonly line: number
  ) {
    super(`${message} (line ${line})`);
    this.name = 'CsvParseError';
  }
}

const NEEDS_QUOTING = /[",\r\n]/;

/**
 * Encode one field.
 *
 * @example
 * encodeCsvField('say "hi", then go') // '"say ""hi"", then go"'
 */
export function encodeCsvField(value: string | number): string {
  const text = typeof value === 'number' ? String(value) : value;
  return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Encode rows, each terminated by `\n`.
 */
export function encodeCsv(rows: ReadonlyArray<ReadonlyArray<string | number>>): string {
  return rows.map((row) => row.map(encodeCsvField).join(',') + '\n').join('');
}

/**
 * Parse CSV text into rows of raw field strings.
 *
 * Accepts `\n`, `\r\n` and `\r` row terminators and quoted fields that
 * span lines. A trailing terminator does not produce an empty row.
 *
 * @throws CsvParseError on an unterminated quoted field or stray quote
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let quotedField = false;
  let line = 1;

  const endField = (): void => {
    row.push(field);
    field = '';
    quotedField = false;
  };
  const endRow = (): void => {
    endField();
    rows.push(row);
    row = [];
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
        if (ch === '\n') {
          line++;
        }
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      if (field !== '' || quotedField) {
        throw new CsvParseError('Unexpected quote inside unquoted field', line);
      }
      inQuotes = true;
      quotedField = true;
    } else if (ch === ',') {
      endField();
    } else if (ch === '\n' || ch === '\r') {
      endRow();
      if (ch === '\r' && text[i + 1] === '\n') {
        i++;
      }
      line++;
    } else {
      field += ch;
    }
  }

  if (inQuotes) {
    throw new CsvParseError('Unterminated quoted field', line);
  }
  if (field !== '' || quotedField || row.length > 0) {
    endRow();
  }

  return rows;
}
