// src/models/personModel.ts
import { query } from "../db";

export type Person = {
  id: number;
  name: string;
  email: string | null;
  /** pg parses TIMESTAMPTZ into a Date. */
  created_at: Date;
};

export type NewPerson = {
  name: string;
  email?: string | null;
};

export interface PeopleRepository {
  list(opts: { limit: number; offset: number }): Promise<Person[]>;
  get(id: number): Promise<Person | undefined>;
  create(input: NewPerson): Promise<Person>;
  searchByName(name: string, limit?: number): Promise<Person[]>;
}

export class PgPeopleRepository implements PeopleRepository {
  async list({ limit, offset }: { limit: number; offset: number }) {
    const sql = `
      SELECT id, name, email, created_at
      FROM people
      ORDER BY id
      LIMIT $1 OFFSET $2
    `;
    const { rows } = await query<Person>(sql, [limit, offset]);
    return rows;
  }

  async get(id: number) {
    const { rows } = await query<Person>(`SELECT id, name, email, created_at FROM people WHERE id = $1`, [id]);
    return rows[0];
  }

  async create(input: NewPerson) {
    const sql = `
      INSERT INTO people (name, email, created_at)
      VALUES ($1, $2, NOW())
      RETURNING id, name, email, created_at
    `;
    const { rows } = await query<Person>(sql, [input.name, input.email ?? null]);
    return rows[0];
  }

  async searchByName(name: string, limit = 50) {
    const sql = `
      SELECT id, name, email, created_at
      FROM people
      WHERE name ILIKE '%' || $1 || '%'
      ORDER BY name
      LIMIT $2
    `;
    const { rows } = await query<Person>(sql, [name, limit]);
    return rows;
  }
}

/** Process-local store; used when no database is configured and in tests. */
export class MemoryPeopleRepository implements PeopleRepository {
  private readonly rows: Person[] = [];
  private nextId = 1;

  constructor(seed: NewPerson[] = [], private readonly clock: () => Date = () => new Date()) {
    for (const p of seed) this.insert(p);
  }

  private insert(input: NewPerson): Person {
    const row: Person = {
      id: this.nextId++,
      name: input.name,
      email: input.email ?? null,
      created_at: this.clock(),
    };
    this.rows.push(row);
    return row;
  }

  async list({ limit, offset }: { limit: number; offset: number }) {
    return this.rows.slice(offset, offset + limit);
  }

  async get(id: number) {
    return this.rows.find((r) => r.id === id);
  }

  async create(input: NewPerson) {
    return this.insert(input);
  }

  async searchByName(name: string, limit = 50) {
    const needle = name.toLowerCase();
    return this.rows
      .filter((r) => r.name.toLowerCase().includes(needle))
      .sort((a, b) => a.name.localeCompare(b.name))
      .slice(0, limit);
  }
}
