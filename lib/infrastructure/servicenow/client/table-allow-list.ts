/**
 * Tables the agent is permitted to operate on. Matching is case-insensitive.
 */
export class TableAllowList {
  private readonly tables: ReadonlySet<string>;

  constructor(tables: readonly string[]) {
    this.tables = new Set(tables.map((table) => table.toLowerCase()));
  }

  isAllowed(table: string): boolean {
    return this.tables.has(table.toLowerCase());
  }

  list(): string[] {
    return [...this.tables];
  }
}
