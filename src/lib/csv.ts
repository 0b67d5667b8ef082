/**
 * Minimal CSV codec for the appointments file.
 *
 * Comma separated, `"` quoted with doubled quotes inside, LF or CRLF line
 * endings, line breaks allowed inside quoted fields.
 */

const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvField(value: string): string {
  if (!NEEDS_QUOTING.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
}

export function formatCsv(rows: string[][]): string {
  return rows.map((row) => row.map(escapeCsvField).join(',')).join('\n') + '\n';
}

export class CsvParseError extends Error {
  constructor(message: string, public readonly line: number) {
    super(`${message} (line ${line})`);
    this.name = 'CsvParseError';
  }
}

/**
 * Parses CSV text into rows of fields. Blank lines are skipped.
 * Each row carries the 1-based line number it started on.
 */
export function parseCsv(text: string): { line: number; fields: string[] }[] {
  const rows: { line: number; fields: string[] }[] = [];
  // Strip a UTF-8 BOM written by spreadsheet tools
  const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  let fields: string[] = [];
  let field = '';
  let inQuotes = false;
  let fieldStarted = false;
  // Only a separator or a line break may follow a closing quote
  let quoteClosed = false;
  let line = 1;
  let rowLine = 1;

  const endRow = () => {
    if (fieldStarted || fields.length > 0 || field !== '') {
      fields.push(field);
      rows.push({ line: rowLine, fields });
    }
    fields = [];
    field = '';
    fieldStarted = false;
    quoteClosed = false;
  };

  for (let i = 0; i < input.length; i++) {
    const char = input[i];

    if (inQuotes) {
      if (char === '"') {
        if (input[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
          quoteClosed = true;
        }
      } else {
        if (char === '\n') {
          line++;
        }
        field += char;
      }
      continue;
    }

    if (quoteClosed && char !== ',' && char !== '\r' && char !== '\n') {
      throw new CsvParseError('Unexpected character after closing quote', line);
    }

    if (char === '"') {
      if (field !== '') {
        throw new CsvParseError('Unexpected quote inside unquoted field', line);
      }
      inQuotes = true;
      fieldStarted = true;
    } else if (char === ',') {
      fields.push(field);
      field = '';
      fieldStarted = true;
      quoteClosed = false;
    } else if (char === '\r') {
      if (input[i + 1] !== '\n') {
        throw new CsvParseError('Bare carriage return', line);
      }
    } else if (char === '\n') {
      endRow();
      line++;
      rowLine = line;
    } else {
      field += char;
    }
  }

  if (inQuotes) {
    throw new CsvParseError('Unterminated quoted field', rowLine);
  }
  endRow();

  return rows;
}
