import { FindOperator } from "typeorm";

type Row = { id: number };
type Criteria = Record<string, unknown>;
type Order = Record<string, "ASC" | "DESC">;

interface FindOptions {
  where?: Criteria;
  order?: Order;
  take?: number;
}

function comparable(value: unknown): unknown {
  return value instanceof Date ? value.getTime() : value;
}

function matches(actual: unknown, expected: unknown): boolean {
  if (expected instanceof FindOperator) {
    switch (expected.type) {
      case "not":
        return expected.child
          ? !matches(actual, expected.child)
          : !matches(actual, expected.value);
      case "in":
        return Array.isArray(expected.value) && expected.value.includes(actual);
      default:
        throw new Error(`in-memory repository does not support ${expected.type}`);
    }
  }
  return comparable(actual) === comparable(expected);
}

function compare(a: unknown, b: unknown): number {
  const left = comparable(a);
  const right = comparable(b);
  if (left === right) {
    return 0;
  }
  if (left === null || left === undefined) {
    return -1;
  }
  if (right === null || right === undefined) {
    return 1;
  }
  if (typeof left === "number" && typeof right === "number") {
    return left - right;
  }
  return String(left) < String(right) ? -1 : 1;
}

function isPresent(value: unknown): boolean {
  return value !== null && value !== undefined;
}

/**
 * Stand-in for the query builder chain used for distinct lookups. Understands
 * `[DISTINCT] alias.column` selections and `alias.column = :param`,
 * `alias.column <> 'literal'` and `alias.column IS NOT NULL` conditions.
 */
export class InMemoryQueryBuilder<T extends Row> {
  private selection: { property: string; alias: string; distinct: boolean } | null = null;
  private readonly predicates: Array<(row: Row) => boolean> = [];
  private direction: "ASC" | "DESC" | null = null;
  private maxRows: number | undefined;

  constructor(
    private readonly alias: string,
    private readonly rows: T[],
    private readonly columns: Record<string, string>
  ) {}

  select(selection: string, alias: string): this {
    const match = /^(DISTINCT )?(\w+)\.(\w+)$/.exec(selection);
    if (!match) {
      throw new Error(`in-memory query builder does not support selection ${selection}`);
    }
    this.selection = {
      property: this.property(match[2], match[3]),
      alias,
      distinct: match[1] !== undefined,
    };
    return this;
  }

  where(condition: string, parameters: Record<string, unknown> = {}): this {
    return this.andWhere(condition, parameters);
  }

  andWhere(condition: string, parameters: Record<string, unknown> = {}): this {
    const nullCheck = /^(\w+)\.(\w+) IS NOT NULL$/.exec(condition);
    if (nullCheck) {
      const property = this.property(nullCheck[1], nullCheck[2]);
      this.predicates.push((row) => isPresent(Reflect.get(row, property)));
      return this;
    }

    const comparison = /^(\w+)\.(\w+) (=|<>) (?::(\w+)|'([^']*)')$/.exec(condition);
    if (!comparison) {
      throw new Error(`in-memory query builder does not support condition ${condition}`);
    }
    const property = this.property(comparison[1], comparison[2]);
    const expected =
      comparison[4] !== undefined ? parameters[comparison[4]] : comparison[5];
    const equal = comparison[3] === "=";
    this.predicates.push(
      (row) =>
        isPresent(Reflect.get(row, property)) &&
        (comparable(Reflect.get(row, property)) === comparable(expected)) === equal
    );
    return this;
  }

  orderBy(sort: string, order: "ASC" | "DESC" = "ASC"): this {
    if (sort !== this.selection?.alias) {
      throw new Error(`in-memory query builder can only order by the selection, not ${sort}`);
    }
    this.direction = order;
    return this;
  }

  limit(limit: number): this {
    this.maxRows = limit;
    return this;
  }

  async getRawMany(): Promise<Record<string, unknown>[]> {
    const selection = this.selection;
    if (!selection) {
      throw new Error("in-memory query builder needs a selection");
    }
    let values = this.rows
      .filter((row) => this.predicates.every((predicate) => predicate(row)))
      .map((row) => Reflect.get(row, selection.property));
    if (selection.distinct) {
      values = [...new Set(values)];
    }
    if (this.direction) {
      const sign = this.direction === "DESC" ? -1 : 1;
      values.sort((a, b) => sign * compare(a, b));
    }
    if (this.maxRows !== undefined) {
      values = values.slice(0, this.maxRows);
    }
    return values.map((value) => ({ [selection.alias]: value }));
  }

  private property(alias: string, column: string): string {
    if (alias !== this.alias) {
      throw new Error(`unknown alias ${alias}`);
    }
    return this.columns[column] ?? column;
  }
}

/**
 * Process-local stand-in for a TypeORM repository. Covers the subset of
 * the repository API the dynamic field services use.
 */
export class InMemoryRepository<T extends Row> {
  private rows: T[] = [];
  private nextId = 1;

  constructor(
    private readonly factory: () => T,
    private readonly timestamps = false,
    private readonly columns: Record<string, string> = {}
  ) {}

  createQueryBuilder(alias: string): InMemoryQueryBuilder<T> {
    return new InMemoryQueryBuilder(alias, this.all(), this.columns);
  }

  create(partial: Partial<T>): T {
    return Object.assign(this.factory(), partial);
  }

  async save(entity: T): Promise<T>;
  async save(entities: T[]): Promise<T[]>;
  async save(input: T | T[]): Promise<T | T[]> {
    if (Array.isArray(input)) {
      return input.map((entity) => this.saveOne(entity));
    }
    return this.saveOne(input);
  }

  async find(options: FindOptions = {}): Promise<T[]> {
    let result = this.rows.filter((row) => this.matchesWhere(row, options.where));
    const order = options.order;
    if (order) {
      result = [...result].sort((a, b) => {
        for (const [key, direction] of Object.entries(order)) {
          const diff = compare(Reflect.get(a, key), Reflect.get(b, key));
          if (diff !== 0) {
            return direction === "DESC" ? -diff : diff;
          }
        }
        return 0;
      });
    }
    if (options.take !== undefined) {
      result = result.slice(0, options.take);
    }
    return result.map((row) => this.clone(row));
  }

  async findOne(options: FindOptions): Promise<T | null> {
    const [first] = await this.find(options);
    return first ?? null;
  }

  async count(options: FindOptions = {}): Promise<number> {
    return this.rows.filter((row) => this.matchesWhere(row, options.where)).length;
  }

  async delete(criteria: Criteria): Promise<{ affected: number }> {
    const before = this.rows.length;
    this.rows = this.rows.filter((row) => !this.matchesWhere(row, criteria));
    return { affected: before - this.rows.length };
  }

  /** Every stored row, in insertion order. */
  all(): T[] {
    return this.rows.map((row) => this.clone(row));
  }

  private saveOne(entity: T): T {
    const now = new Date();
    if (this.timestamps) {
      if (!Reflect.get(entity, "createTime")) {
        Reflect.set(entity, "createTime", now);
      }
      Reflect.set(entity, "changeTime", now);
    }
    if (!entity.id) {
      entity.id = this.nextId++;
    }
    const stored = this.clone(entity);
    const index = this.rows.findIndex((row) => row.id === entity.id);
    if (index === -1) {
      this.rows.push(stored);
    } else {
      this.rows[index] = stored;
    }
    return entity;
  }

  private matchesWhere(row: T, where: Criteria | undefined): boolean {
    if (!where) {
      return true;
    }
    return Object.entries(where).every(([key, expected]) =>
      matches(Reflect.get(row, key), expected)
    );
  }

  private clone(row: T): T {
    return Object.assign(this.factory(), row);
  }
}

/**
 * Stand-in for a TypeORM DataSource whose transactions run against the
 * given in-memory repositories. There is no rollback.
 */
export class InMemoryDataSource {
  constructor(
    private readonly repositories: Map<Function, InMemoryRepository<Row>>
  ) {}

  getRepository(target: Function): InMemoryRepository<Row> {
    const repository = this.repositories.get(target);
    if (!repository) {
      throw new Error(`no in-memory repository for ${target.name}`);
    }
    return repository;
  }

  async transaction<R>(
    work: (manager: { getRepository(target: Function): InMemoryRepository<Row> }) => Promise<R>
  ): Promise<R> {
    return work({ getRepository: (target) => this.getRepository(target) });
  }

  async query(): Promise<unknown[]> {
    return [{ "?column?": 1 }];
  }
}
