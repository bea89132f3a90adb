import { describe, test, expect } from 'vitest';
import { SchemaModel, toPascalCase, toSnakeCase } from './schemaModel';
import { MissingPrimaryKeyError } from './errors';
import { createColumn } from './model';

function posts(): SchemaModel {
  return new SchemaModel('blog_posts')
    .setPrimaryKey(createColumn('id', 'BigInteger'))
    .addColumn(createColumn('title', 'String', { unique: true }))
    .addColumn(createColumn('body', 'Text', { nullable: true }))
    .addColumn(createColumn('word_count', 'Integer', { ignored: true }))
    .addColumn(createColumn('author_id', 'BigInteger'))
    .addForeignKey({ fromColumn: 'author_id', toTable: 'users', toColumn: 'id', onDelete: 'Cascade', onUpdate: 'NoAction' })
    .addIndex({ name: 'idx_blog_posts_title', columns: ['title'], unique: false });
}

describe('SchemaModel', () => {
  test('validate requires a primary key', () => {
    expect(() => new SchemaModel('logs').validate()).toThrow(MissingPrimaryKeyError);
    expect(() => new SchemaModel('logs').validate()).toThrow("Schema 'logs' has no primary key");
    expect(() => posts().validate()).not.toThrow();
  });

  test('the primary key is never nullable, unique or ignored', () => {
    const schema = new SchemaModel('t')
      .setPrimaryKey(createColumn('id', 'Uuid', { nullable: true, unique: true, ignored: true }))
      .toParsedSchema();

    expect(schema.primaryKey).toEqual({ name: 'id', colType: 'Uuid', nullable: false, unique: false, ignored: false });
  });

  test('toParsedSchema returns copies', () => {
    const model = posts();
    const first = model.toParsedSchema();
    model.addColumn(createColumn('slug', 'String'));

    expect(first.columns.map(c => c.name)).toEqual(['title', 'body', 'word_count', 'author_id']);
    expect(model.toParsedSchema().columns.map(c => c.name)).toEqual(['title', 'body', 'word_count', 'author_id', 'slug']);
  });

  test('create table SQL leaves ignored columns out', () => {
    expect(posts().toCreateTableSql()).toEqual([
      [
        'CREATE TABLE IF NOT EXISTS "blog_posts" (',
        '  "id" bigint GENERATED BY DEFAULT AS IDENTITY NOT NULL PRIMARY KEY,',
        '  "title" varchar NOT NULL UNIQUE,',
        '  "body" text NULL,',
        '  "author_id" bigint NOT NULL,',
        '  CONSTRAINT "fk_blog_posts_author_id" FOREIGN KEY ("author_id") REFERENCES "users" ("id") ON DELETE CASCADE ON UPDATE NO ACTION',
        ');',
      ].join('\n'),
      'CREATE INDEX "idx_blog_posts_title" ON "blog_posts" ("title");',
    ]);
  });

  test('model binding keeps ignored columns as unpersisted fields', () => {
    const binding = posts().toModelBinding();

    expect(binding.primaryKey?.tsType).toBe('bigint');
    expect(binding.fields.map(f => [f.name, f.tsType, f.persisted])).toEqual([
      ['title', 'string', true],
      ['body', 'string | null', true],
      ['word_count', 'number', false],
      ['author_id', 'bigint', true],
    ]);
  });

  test('renders the model interface', () => {
    expect(posts().renderModelInterface()).toBe([
      'export interface BlogPosts {',
      '  id: bigint;',
      '  title: string;',
      '  body: string | null;',
      '  word_count: number; // not persisted',
      '  author_id: bigint;',
      '}',
    ].join('\n'));
  });
});

describe('name helpers', () => {
  test('toSnakeCase', () => {
    expect(toSnakeCase('BlogPost')).toBe('blog_post');
    expect(toSnakeCase('user')).toBe('user');
  });

  test('toPascalCase', () => {
    expect(toPascalCase('blog_posts')).toBe('BlogPosts');
    expect(toPascalCase('users')).toBe('Users');
  });
});
