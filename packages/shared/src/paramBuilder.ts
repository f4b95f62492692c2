/**
 * Accumulates positional query parameters and hands back the matching
 * PostgreSQL placeholder for each value, so SQL built piecewise never has to
 * count `$N` indices by hand.
 *
 * ```ts
 * const p = new ParamBuilder();
 * const sql = `UPDATE videos SET status = ${p.add("ERROR")}
 *              WHERE video_id IN (${p.list(ids)})`;
 * await pool.query(sql, p.values());
 * ```
 */
export class ParamBuilder {
  private readonly params: unknown[] = [];

  add(val: unknown): string {
    this.params.push(val);
    return `$${this.params.length}`;
  }

  /**
   * Adds every value and returns their placeholders joined for an `IN (...)`
   * clause.
   */
  list(vals: readonly unknown[]): string {
    return vals.map((val) => this.add(val)).join(", ");
  }

  /** Copy of the accumulated parameters in insertion order. */
  values(): unknown[] {
    return [...this.params];
  }

  get length(): number {
    return this.params.length;
  }
}
