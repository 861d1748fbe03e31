/**
 * CSV parsing for reference table files
 *
 * Line-based: one record per line, quoted fields may contain commas and
 * doubled quotes but not line breaks.
 */

/**
 * A parsed, non-blank line with its 1-based line number in the file
 */
export interface CsvRecord {
  line: number;
  fields: string[];
}

/**
 * Parse a single CSV line, handling quoted fields.
 * Fields are trimmed. A quote opens a quoted field only at the start of the
 * field; anywhere else it is a literal character.
 *
 * @example
 * parseCSVLine('Public Works,PW');          // ["Public Works", "PW"]
 * parseCSVLine('"Parks, Trails",PT');       // ["Parks, Trails", "PT"]
 * parseCSVLine('"The ""Annex""",ANX');      // ['The "Annex"', "ANX"]
 * parseCSVLine('27" Display,DSP');          // ['27" Display', "DSP"]
 */
export function parseCSVLine(line: string): string[] {
  const result: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];

    if (inQuotes) {
      if (char !== '"') {
        current += char;
      } else if (line[i + 1] === '"') {
        current += '"';
        i++;
      } else {
        inQuotes = false;
      }
    } else if (char === '"' && current.trim() === '') {
      inQuotes = true;
      current = '';
    } else if (char === ',') {
      result.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }

  result.push(current.trim());
  return result;
}

/**
 * Split file content into records, skipping blank lines.
 * Strips a leading UTF-8 BOM and accepts LF or CRLF line endings.
 */
export function parseCSV(content: string): CsvRecord[] {
  const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
  const records: CsvRecord[] = [];

  text.split(/\r?\n/).forEach((raw, index) => {
    if (raw.trim() === '') {
      return;
    }
    records.push({ line: index + 1, fields: parseCSVLine(raw) });
  });

  return records;
}
