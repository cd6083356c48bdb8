export interface Migration {
  id: string;
  sql: string;
}

/** Applied in array order; ids are recorded in `schema_migrations`. */
export const MIGRATIONS: readonly Migration[] = [
  {
    id: '0001_create_libraries',
    sql: `
      CREATE TABLE libraries (
        id          INTEGER PRIMARY KEY,
        name        TEXT    NOT NULL UNIQUE,
        capacity    INTEGER NOT NULL CHECK (capacity > 0),
        book_count  INTEGER NOT NULL DEFAULT 0 CHECK (book_count >= 0 AND book_count <= capacity),
        created_at  TEXT    NOT NULL DEFAULT (datetime('now')),
        updated_at  TEXT    NOT NULL DEFAULT (datetime('now'))
      );
    `,
  },
];
