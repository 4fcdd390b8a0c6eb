function matches(row: object, where: object): boolean {
  return Object.entries(where).every(([key, value]) => Reflect.get(row, key) === value);
}

/** Stand-in for the TypeORM repository calls the indexer makes. */
export class InMemoryRepository<T extends object> {
  readonly rows: (T & { id: string })[] = [];
  private nextId = 1;

  create(data: T): T {
    return { ...data };
  }

  async save(data: T): Promise<T & { id: string }> {
    const row = { ...data, id: String(this.nextId++) };
    this.rows.push(row);
    return row;
  }

  async findOne(options: { where: Partial<T> }): Promise<(T & { id: string }) | null> {
    return this.rows.find(row => matches(row, options.where)) ?? null;
  }

  async find(options: { where: Partial<T> | Partial<T>[] }): Promise<(T & { id: string })[]> {
    const clauses = Array.isArray(options.where) ? options.where : [options.where];
    return this.rows.filter(row => clauses.some(clause => matches(row, clause)));
  }
}
