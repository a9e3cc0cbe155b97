/**
 * `($1, $2), ($3, $4)` style placeholders for a multi-row VALUES list.
 */
export function valuesPlaceholders(rowCount: number, width: number, offset: number = 0): string {
  const rows: string[] = [];
  for (let row = 0; row < rowCount; row += 1) {
    const cells: string[] = [];
    for (let column = 1; column <= width; column += 1) {
      cells.push(`$${offset + row * width + column}`);
    }
    rows.push(`(${cells.join(', ')})`);
  }
  return rows.join(', ');
}

export function listPlaceholders(count: number, offset: number = 0): string {
  return Array.from({ length: count }, (_, index) => `$${offset + index + 1}`).join(', ');
}
