import type { SupabaseClient } from "@supabase/supabase-js";

type Row = Record<string, unknown>;
type FakeError = { code: string; message: string };
type FakeResult = { data: unknown; error: FakeError | null };
type Operation = "select" | "insert" | "update" | "upsert";

export type FakeCall = {
  table: string;
  operation: Operation;
  filters: Array<[string, unknown]>;
  payload: Row | Row[] | null;
  options?: { onConflict?: string; ignoreDuplicates?: boolean };
};

type UniqueKeys = Record<string, string[][]>;

/**
 * In-process stand-in for the PostgREST query builder: tables are arrays of
 * rows, unique keys produce 23505 errors, and every call is recorded.
 */
export class FakeSupabase {
  readonly tables = new Map<string, Row[]>();
  readonly calls: FakeCall[] = [];
  private failures = new Map<string, FakeError>();

  constructor(private readonly uniqueKeys: UniqueKeys = {}) {}

  rows(table: string): Row[] {
    const existing = this.tables.get(table);
    if (existing) return existing;
    const created: Row[] = [];
    this.tables.set(table, created);
    return created;
  }

  failNext(table: string, operation: Operation, error: FakeError) {
    this.failures.set(`${table}:${operation}`, error);
  }

  takeFailure(table: string, operation: Operation): FakeError | null {
    const key = `${table}:${operation}`;
    const failure = this.failures.get(key) ?? null;
    this.failures.delete(key);
    return failure;
  }

  violatesUnique(table: string, row: Row, pending: readonly Row[] = []): boolean {
    const keys = this.uniqueKeys[table] ?? [];
    const existingRows = [...this.rows(table), ...pending];
    return keys.some((columns) =>
      existingRows.some((existing) =>
        columns.every((column) => existing[column] === row[column]),
      ),
    );
  }

  from(table: string) {
    return new FakeQuery(this, table);
  }

  asClient(): SupabaseClient {
    // The workflows only touch `from`; the fake covers that surface.
    return this as unknown as SupabaseClient;
  }
}

class FakeQuery implements PromiseLike<FakeResult> {
  private operation: Operation = "select";
  private payload: Row | Row[] | null = null;
  private options: FakeCall["options"];
  private readonly filters: Array<[string, unknown]> = [];

  constructor(
    private readonly db: FakeSupabase,
    private readonly table: string,
  ) {}

  select(_columns?: string) {
    return this;
  }

  insert(row: Row | Row[]) {
    this.operation = "insert";
    this.payload = row;
    return this;
  }

  update(values: Row) {
    this.operation = "update";
    this.payload = values;
    return this;
  }

  upsert(row: Row, options?: { onConflict?: string; ignoreDuplicates?: boolean }) {
    this.operation = "upsert";
    this.payload = row;
    this.options = options;
    return this;
  }

  eq(column: string, value: unknown) {
    this.filters.push([column, value]);
    return this;
  }

  returns<_T>() {
    return this;
  }

  async maybeSingle<_T>(): Promise<FakeResult> {
    const result = this.execute();
    if (result.error || !Array.isArray(result.data)) {
      return result;
    }
    if (result.data.length > 1) {
      return {
        data: null,
        error: { code: "PGRST116", message: "multiple rows returned" },
      };
    }
    return { data: result.data[0] ?? null, error: null };
  }

  then<TResult1 = FakeResult, TResult2 = never>(
    onfulfilled?: ((value: FakeResult) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null,
  ): PromiseLike<TResult1 | TResult2> {
    return Promise.resolve(this.execute()).then(onfulfilled, onrejected);
  }

  private matches(row: Row): boolean {
    return this.filters.every(([column, value]) => row[column] === value);
  }

  private execute(): FakeResult {
    this.db.calls.push({
      table: this.table,
      operation: this.operation,
      filters: [...this.filters],
      payload: this.payload,
      options: this.options,
    });

    const failure = this.db.takeFailure(this.table, this.operation);
    if (failure) {
      return { data: null, error: failure };
    }

    const rows = this.db.rows(this.table);
    const batch = Array.isArray(this.payload) ? this.payload : [this.payload ?? {}];
    const payload = batch[0] ?? {};

    if (this.operation === "select") {
      return { data: rows.filter((row) => this.matches(row)).map((row) => ({ ...row })), error: null };
    }

    if (this.operation === "insert") {
      // A batch insert is one statement: a single conflict rejects every row.
      const accepted: Row[] = [];
      for (const row of batch) {
        if (this.db.violatesUnique(this.table, row, accepted)) {
          return {
            data: null,
            error: { code: "23505", message: "duplicate key value violates unique constraint" },
          };
        }
        accepted.push({ ...row });
      }
      rows.push(...accepted);
      return { data: null, error: null };
    }

    if (this.operation === "upsert") {
      if (this.db.violatesUnique(this.table, payload)) {
        if (this.options?.ignoreDuplicates) {
          return { data: null, error: null };
        }
        return {
          data: null,
          error: { code: "23505", message: "duplicate key value violates unique constraint" },
        };
      }
      rows.push({ ...payload });
      return { data: null, error: null };
    }

    const updated: Row[] = [];
    for (const row of rows) {
      if (this.matches(row)) {
        Object.assign(row, payload);
        updated.push({ ...row });
      }
    }
    return { data: updated, error: null };
  }
}
