import type { ColumnType, ParsedColumn, ParsedFk, ParsedIndex, ParsedSchema } from './model';
import { dbColumns, fkConstraintName } from './model';
import { columnTypeTs, isIntegerType } from './columnTypes';
import { ColumnDef, ForeignKey, Index, type TableCreateStatement, Table } from './ddl';
import { MissingPrimaryKeyError } from './errors';

export interface ModelField {
  readonly name: string;
  readonly colType: ColumnType;
  /** TypeScript type of the value, including `| null` when nullable */
  readonly tsType: string;
  readonly nullable: boolean;
  readonly unique: boolean;
  /** False for ignored columns, which the mapping layer keeps off the table */
  readonly persisted: boolean;
}

export interface ModelBinding {
  readonly tableName: string;
  readonly primaryKey: ModelField | undefined;
  readonly fields: readonly ModelField[];
}

/**
 * Accretive builder over one table's structure.
 *
 * Both source front-ends feed one of these; everything derived from it
 * (DDL statements, model binding) is a pure function of its current state.
 */
export class SchemaModel {
  private _primaryKey: ParsedColumn | undefined;
  private readonly _columns: ParsedColumn[] = [];
  private readonly _foreignKeys: ParsedFk[] = [];
  private readonly _indexes: ParsedIndex[] = [];

  constructor(private _tableName: string) { }

  static fromParsed(schema: ParsedSchema): SchemaModel {
    const model = new SchemaModel(schema.tableName);
    if (schema.primaryKey) {
      model.setPrimaryKey(schema.primaryKey);
    }
    schema.columns.forEach(c => model.addColumn(c));
    schema.foreignKeys.forEach(fk => model.addForeignKey(fk));
    schema.indexes.forEach(idx => model.addIndex(idx));
    return model;
  }

  get tableName(): string {
    return this._tableName;
  }

  setTableName(name: string): this {
    this._tableName = name;
    return this;
  }

  setPrimaryKey(column: ParsedColumn): this {
    this._primaryKey = { ...column, nullable: false, unique: false, ignored: false };
    return this;
  }

  /** A column with an existing name replaces the earlier declaration in place. */
  addColumn(column: ParsedColumn): this {
    const existing = this._columns.findIndex(c => c.name === column.name);
    if (existing >= 0) {
      this._columns[existing] = column;
    } else {
      this._columns.push(column);
    }
    return this;
  }

  addForeignKey(fk: ParsedFk): this {
    this._foreignKeys.push(fk);
    return this;
  }

  addIndex(index: ParsedIndex): this {
    this._indexes.push(index);
    return this;
  }

  validate(): void {
    if (this._primaryKey === undefined) {
      throw new MissingPrimaryKeyError(this._tableName);
    }
  }

  toParsedSchema(): ParsedSchema {
    return {
      tableName: this._tableName,
      primaryKey: this._primaryKey,
      columns: [...this._columns],
      foreignKeys: [...this._foreignKeys],
      indexes: this._indexes.map(idx => ({ ...idx, columns: [...idx.columns] })),
    };
  }

  /**
   * Full table definition: primary key, database columns, then foreign keys
   * and indexes. Ignored columns are left out.
   */
  toCreateTableStatement(): TableCreateStatement {
    const schema = this.toParsedSchema();
    const table = Table.create().table(schema.tableName).ifNotExists();

    if (schema.primaryKey) {
      table.col(primaryKeyColumnDef(schema.primaryKey));
    }
    for (const column of dbColumns(schema)) {
      table.col(columnDef(column));
    }
    for (const fk of schema.foreignKeys) {
      table.foreignKey(
        ForeignKey.create()
          .name(fkConstraintName(schema.tableName, fk))
          .from(schema.tableName, fk.fromColumn)
          .to(fk.toTable, fk.toColumn)
          .onDelete(fk.onDelete)
          .onUpdate(fk.onUpdate)
      );
    }
    for (const idx of schema.indexes) {
      const index = Index.create().name(idx.name).table(schema.tableName);
      idx.columns.forEach(c => index.col(c));
      if (idx.unique) {
        index.unique();
      }
      table.index(index);
    }

    return table;
  }

  toCreateTableSql(): string[] {
    return this.toCreateTableStatement().toSql();
  }

  toModelBinding(): ModelBinding {
    const schema = this.toParsedSchema();
    const pkName = schema.primaryKey?.name;
    return {
      tableName: schema.tableName,
      primaryKey: schema.primaryKey && toField(schema.primaryKey),
      fields: schema.columns.filter(c => c.name !== pkName).map(toField),
    };
  }

  renderModelInterface(): string {
    const binding = this.toModelBinding();
    const lines = [`export interface ${toPascalCase(binding.tableName)} {`];
    const fields = binding.primaryKey ? [binding.primaryKey, ...binding.fields] : binding.fields;

    for (const field of fields) {
      const note = field.persisted ? '' : ' // not persisted';
      lines.push(`  ${field.name}: ${field.tsType};${note}`);
    }
    lines.push('}');
    return lines.join('\n');
  }
}

export function primaryKeyColumnDef(pk: ParsedColumn): ColumnDef {
  const def = ColumnDef.create(pk.name).ofType(pk.colType).notNull();
  if (isIntegerType(pk.colType)) {
    def.autoIncrement();
  }
  return def.primaryKey();
}

export function columnDef(column: ParsedColumn): ColumnDef {
  const def = ColumnDef.create(column.name).ofType(column.colType);
  if (column.nullable) {
    def.null();
  } else {
    def.notNull();
  }
  if (column.unique) {
    def.unique();
  }
  return def;
}

function toField(column: ParsedColumn): ModelField {
  const base = columnTypeTs(column.colType);
  return {
    name: column.name,
    colType: column.colType,
    tsType: column.nullable ? `${base} | null` : base,
    nullable: column.nullable,
    unique: column.unique,
    persisted: !column.ignored,
  };
}

/**
 * PascalCase → snake_case, used to derive a table name from a model name.
 */
export function toSnakeCase(name: string): string {
  let result = '';
  for (let i = 0; i < name.length; i++) {
    const ch = name[i];
    const lower = ch.toLowerCase();
    if (i > 0 && ch !== lower) {
      result += '_';
    }
    result += lower;
  }
  return result;
}

export function toPascalCase(name: string): string {
  return name
    .split('_')
    .filter(part => part.length > 0)
    .map(part => part[0].toUpperCase() + part.slice(1))
    .join('');
}
