/**
 * Lazily executed query result.
 * The query runs on first access and its rows are shared by every later
 * count, lookup and iteration.
 */
export class ResultSet<T> implements AsyncIterable<T> {
  private rows?: Promise<T[]>;

  constructor(private readonly query: () => Promise<T[]>) {}

  toArray(): Promise<T[]> {
    this.rows ??= this.query();
    return this.rows;
  }

  async count(): Promise<number> {
    const rows = await this.toArray();
    return rows.length;
  }

  async first(): Promise<T | null> {
    return this.at(0);
  }

  async at(index: number): Promise<T | null> {
    const rows = await this.toArray();
    return index >= 0 && index < rows.length ? rows[index] : null;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T> {
    for (const row of await this.toArray()) {
      yield row;
    }
  }
}
