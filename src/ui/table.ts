import Table from 'cli-table3';

export type ColumnAlign = 'left' | 'center' | 'right';

export function printTable(head: string[], rows: string[][], align: ColumnAlign[] = []): void {
  const table = new Table({ head, colAligns: align, style: { head: ['cyan'] } });
  table.push(...rows);
  console.log(table.toString());
}

/** Cuts `text` to `max` characters and marks the cut with an ellipsis. */
export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
