export type TableCell = string | number | null | undefined;

function cellText(value: TableCell): string {
  return value === null || value === undefined ? '-' : String(value);
}

/**
 * Tabla ASCII para la consola:
 *
 * +----------+--------+
 * | Instance | Status |
 * +----------+--------+
 * | ventas   | open   |
 * +----------+--------+
 */
export function formatTable(headers: string[], rows: TableCell[][]): string[] {
  const cells = rows.map((row) => headers.map((_, index) => cellText(row[index])));
  const widths = headers.map((header, index) =>
    Math.max(header.length, ...cells.map((row) => row[index].length)),
  );

  const border = `+${widths.map((width) => '-'.repeat(width + 2)).join('+')}+`;
  const line = (values: string[]) =>
    `| ${values.map((value, index) => value.padEnd(widths[index])).join(' | ')} |`;

  return [border, line(headers), border, ...cells.map(line), border];
}
