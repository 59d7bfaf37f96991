/**
 * Splits CSV text into rows of fields. Handles quoted fields with `""`
 * escapes and embedded separators or newlines, and both LF and CRLF endings.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;

  const endField = () => {
    row.push(field);
    field = '';
  };
  const endRow = () => {
    endField();
    rows.push(row);
    row = [];
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          quoted = false;
        }
      } else {
        field += ch;
      }
      continue;
    }
    switch (ch) {
      case '"':
        quoted = true;
        break;
      case ',':
        endField();
        break;
      case '\r':
        if (text[i + 1] === '\n') i++;
        endRow();
        break;
      case '\n':
        endRow();
        break;
      default:
        field += ch;
    }
  }
  if (field !== '' || row.length > 0) endRow();
  return rows;
}
