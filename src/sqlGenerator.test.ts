import { describe, test, expect } from 'vitest';
import {
  escapeIdentifier,
  generateAddForeignKeySql,
  generateAlterTableSql,
  generateColumnSql,
  generateCreateIndexSql,
  generateCreateTableSql,
  generateDropForeignKeySql,
  generateDropIndexSql,
  generateDropTableSql,
  type ColumnDefinition,
  type ForeignKeyDefinition,
} from './sqlGenerator';

function column(overrides: Partial<ColumnDefinition> & Pick<ColumnDefinition, 'name'>): ColumnDefinition {
  return {
    type: 'String',
    nullable: false,
    unique: false,
    primaryKey: false,
    autoIncrement: false,
    ...overrides,
  };
}

const authorFk: ForeignKeyDefinition = {
  name: undefined,
  fromTable: 'posts',
  fromColumn: 'author_id',
  toTable: 'users',
  toColumn: 'id',
  onDelete: 'Cascade',
  onUpdate: 'NoAction',
};

describe('escapeIdentifier', () => {
  test('quotes and doubles embedded quotes', () => {
    expect(escapeIdentifier('users')).toBe('"users"');
    expect(escapeIdentifier('we"ird')).toBe('"we""ird"');
  });
});

describe('generateColumnSql', () => {
  test('integer primary key with identity', () => {
    expect(generateColumnSql(column({ name: 'id', type: 'Integer', primaryKey: true, autoIncrement: true })))
      .toBe('"id" integer GENERATED BY DEFAULT AS IDENTITY NOT NULL PRIMARY KEY');
  });

  test('autoIncrement is ignored on non-integer types', () => {
    expect(generateColumnSql(column({ name: 'id', type: 'Uuid', primaryKey: true, autoIncrement: true })))
      .toBe('"id" uuid NOT NULL PRIMARY KEY');
  });

  test('nullability and uniqueness', () => {
    expect(generateColumnSql(column({ name: 'email', unique: true }))).toBe('"email" varchar NOT NULL UNIQUE');
    expect(generateColumnSql(column({ name: 'bio', type: 'Text', nullable: true }))).toBe('"bio" text NULL');
    expect(generateColumnSql(column({ name: 'data', type: 'JsonBinary', nullable: undefined }))).toBe('"data" jsonb');
  });
});

describe('generateCreateTableSql', () => {
  test('columns then named foreign key constraints', () => {
    const sql = generateCreateTableSql(
      'posts',
      [
        column({ name: 'id', type: 'BigInteger', primaryKey: true, autoIncrement: true }),
        column({ name: 'author_id', type: 'BigInteger' }),
      ],
      [authorFk],
      true
    );

    expect(sql).toBe([
      'CREATE TABLE IF NOT EXISTS "posts" (',
      '  "id" bigint GENERATED BY DEFAULT AS IDENTITY NOT NULL PRIMARY KEY,',
      '  "author_id" bigint NOT NULL,',
      '  CONSTRAINT "fk_posts_author_id" FOREIGN KEY ("author_id") REFERENCES "users" ("id") ON DELETE CASCADE ON UPDATE NO ACTION',
      ');',
    ].join('\n'));
  });
});

describe('generateAlterTableSql', () => {
  test('one statement per add and drop', () => {
    expect(generateAlterTableSql('users', [
      { type: 'addColumn', column: column({ name: 'bio', type: 'Text', nullable: true }) },
      { type: 'dropColumn', name: 'legacy' },
    ])).toEqual([
      'ALTER TABLE "users" ADD COLUMN "bio" text NULL;',
      'ALTER TABLE "users" DROP COLUMN "legacy";',
    ]);
  });

  test('modifying a column rewrites type, nullability and the unique constraint', () => {
    expect(generateAlterTableSql('users', [
      { type: 'modifyColumn', column: column({ name: 'age', type: 'BigInteger', unique: true }) },
    ])).toEqual([
      'ALTER TABLE "users" ALTER COLUMN "age" TYPE bigint USING "age"::bigint;',
      'ALTER TABLE "users" ALTER COLUMN "age" SET NOT NULL;',
      'ALTER TABLE "users" DROP CONSTRAINT IF EXISTS "users_age_key";',
      'ALTER TABLE "users" ADD CONSTRAINT "users_age_key" UNIQUE ("age");',
    ]);
  });

  test('making a column nullable drops NOT NULL', () => {
    expect(generateAlterTableSql('users', [
      { type: 'modifyColumn', column: column({ name: 'age', type: 'Integer', nullable: true }) },
    ])).toEqual([
      'ALTER TABLE "users" ALTER COLUMN "age" TYPE integer USING "age"::integer;',
      'ALTER TABLE "users" ALTER COLUMN "age" DROP NOT NULL;',
      'ALTER TABLE "users" DROP CONSTRAINT IF EXISTS "users_age_key";',
    ]);
  });
});

describe('constraints and indexes', () => {
  test('foreign keys', () => {
    expect(generateAddForeignKeySql({ ...authorFk, name: 'fk_custom', onUpdate: 'SetNull' })).toBe(
      'ALTER TABLE "posts" ADD CONSTRAINT "fk_custom" FOREIGN KEY ("author_id") REFERENCES "users" ("id") ON DELETE CASCADE ON UPDATE SET NULL;'
    );
    expect(generateDropForeignKeySql('posts', 'fk_custom')).toBe(
      'ALTER TABLE "posts" DROP CONSTRAINT IF EXISTS "fk_custom";'
    );
  });

  test('a foreign key needs its owning table', () => {
    expect(() => generateAddForeignKeySql({ ...authorFk, fromTable: undefined })).toThrow(
      'Cannot generate SQL for a foreign key without a table'
    );
  });

  test('indexes', () => {
    expect(generateCreateIndexSql({ name: 'idx_posts_a_b', table: 'posts', columns: ['a', 'b'], unique: true }))
      .toBe('CREATE UNIQUE INDEX "idx_posts_a_b" ON "posts" ("a", "b");');
    expect(generateDropIndexSql('idx_posts_a_b')).toBe('DROP INDEX IF EXISTS "idx_posts_a_b";');
  });

  test('drop table', () => {
    expect(generateDropTableSql('posts', false)).toBe('DROP TABLE "posts";');
    expect(generateDropTableSql('posts', true)).toBe('DROP TABLE IF EXISTS "posts";');
  });
});
