import type { ColumnType, FkAction } from './model';
import {
  generateAddForeignKeySql,
  generateAlterTableSql,
  generateCreateIndexSql,
  generateCreateTableSql,
  generateDropForeignKeySql,
  generateDropIndexSql,
  generateDropTableSql,
  type AlterOperation,
  type ColumnDefinition,
  type ForeignKeyDefinition,
  type IndexDefinition,
} from './sqlGenerator';

/**
 * Statement builders called by generated migration modules.
 *
 * A migration's `up`/`down` receive a {@link SchemaManager} and hand it
 * statements built here. {@link SqlSchemaManager} turns them into SQL.
 */

export const ForeignKeyAction = {
  Cascade: 'Cascade',
  SetNull: 'SetNull',
  SetDefault: 'SetDefault',
  Restrict: 'Restrict',
  NoAction: 'NoAction',
} as const satisfies Record<FkAction, FkAction>;

export class ColumnDef {
  private _type: ColumnType = 'String';
  private _nullable: boolean | undefined = undefined;
  private _unique = false;
  private _primaryKey = false;
  private _autoIncrement = false;

  private constructor(private readonly _name: string) { }

  static create(name: string): ColumnDef {
    return new ColumnDef(name);
  }

  get definition(): ColumnDefinition {
    return {
      name: this._name,
      type: this._type,
      nullable: this._nullable,
      unique: this._unique,
      primaryKey: this._primaryKey,
      autoIncrement: this._autoIncrement,
    };
  }

  ofType(type: ColumnType): this {
    this._type = type;
    return this;
  }

  tinyInteger(): this { return this.ofType('TinyInteger'); }
  smallInteger(): this { return this.ofType('SmallInteger'); }
  integer(): this { return this.ofType('Integer'); }
  bigInteger(): this { return this.ofType('BigInteger'); }
  unsigned(): this { return this.ofType('Unsigned'); }
  bigUnsigned(): this { return this.ofType('BigUnsigned'); }
  float(): this { return this.ofType('Float'); }
  double(): this { return this.ofType('Double'); }
  decimal(): this { return this.ofType('Decimal'); }
  boolean(): this { return this.ofType('Boolean'); }
  string(): this { return this.ofType('String'); }
  text(): this { return this.ofType('Text'); }
  char(): this { return this.ofType('Char'); }
  dateTime(): this { return this.ofType('DateTime'); }
  timestamp(): this { return this.ofType('Timestamp'); }
  timestampTz(): this { return this.ofType('TimestampWithTimeZone'); }
  date(): this { return this.ofType('Date'); }
  time(): this { return this.ofType('Time'); }
  uuid(): this { return this.ofType('Uuid'); }
  json(): this { return this.ofType('Json'); }
  jsonBinary(): this { return this.ofType('JsonBinary'); }
  binary(): this { return this.ofType('Binary'); }
  varBinary(): this { return this.ofType('VarBinary'); }
  blob(): this { return this.ofType('Blob'); }
  inet(): this { return this.ofType('Inet'); }
  cidr(): this { return this.ofType('Cidr'); }
  macAddress(): this { return this.ofType('MacAddr'); }
  interval(): this { return this.ofType('Interval'); }
  enumType(): this { return this.ofType('Enum'); }

  null(): this {
    this._nullable = true;
    return this;
  }

  notNull(): this {
    this._nullable = false;
    return this;
  }

  unique(): this {
    this._unique = true;
    return this;
  }

  primaryKey(): this {
    this._primaryKey = true;
    return this;
  }

  autoIncrement(): this {
    this._autoIncrement = true;
    return this;
  }
}

export class ForeignKeyCreateStatement {
  private _name: string | undefined;
  private _fromTable: string | undefined;
  private _fromColumn = '';
  private _toTable = '';
  private _toColumn = 'id';
  private _onDelete: FkAction = 'NoAction';
  private _onUpdate: FkAction = 'NoAction';

  get definition(): ForeignKeyDefinition {
    return {
      name: this._name,
      fromTable: this._fromTable,
      fromColumn: this._fromColumn,
      toTable: this._toTable,
      toColumn: this._toColumn,
      onDelete: this._onDelete,
      onUpdate: this._onUpdate,
    };
  }

  name(name: string): this {
    this._name = name;
    return this;
  }

  from(table: string, column: string): this {
    this._fromTable = table;
    this._fromColumn = column;
    return this;
  }

  to(table: string, column = 'id'): this {
    this._toTable = table;
    this._toColumn = column;
    return this;
  }

  /** Inline form: the owning table is implied by the table statement */
  column(column: string): this {
    this._fromColumn = column;
    return this;
  }

  references(table: string, column = 'id'): this {
    return this.to(table, column);
  }

  onDelete(action: FkAction): this {
    this._onDelete = action;
    return this;
  }

  onUpdate(action: FkAction): this {
    this._onUpdate = action;
    return this;
  }
}

export class ForeignKeyDropStatement {
  private _name = '';
  private _table = '';

  name(name: string): this {
    this._name = name;
    return this;
  }

  table(table: string): this {
    this._table = table;
    return this;
  }

  toSql(): string {
    return generateDropForeignKeySql(this._table, this._name);
  }
}

export class IndexCreateStatement {
  private _name = '';
  private _table: string | undefined;
  private readonly _columns: string[] = [];
  private _unique = false;

  get definition(): IndexDefinition {
    return {
      name: this._name,
      table: this._table,
      columns: [...this._columns],
      unique: this._unique,
    };
  }

  name(name: string): this {
    this._name = name;
    return this;
  }

  table(table: string): this {
    this._table = table;
    return this;
  }

  col(column: string): this {
    this._columns.push(column);
    return this;
  }

  unique(): this {
    this._unique = true;
    return this;
  }
}

export class IndexDropStatement {
  private _name = '';

  name(name: string): this {
    this._name = name;
    return this;
  }

  toSql(): string {
    return generateDropIndexSql(this._name);
  }
}

export class TableCreateStatement {
  private _table = '';
  private _ifNotExists = false;
  private readonly _columns: ColumnDef[] = [];
  private readonly _foreignKeys: ForeignKeyCreateStatement[] = [];
  private readonly _indexes: IndexCreateStatement[] = [];

  get tableName(): string {
    return this._table;
  }

  table(name: string): this {
    this._table = name;
    return this;
  }

  ifNotExists(): this {
    this._ifNotExists = true;
    return this;
  }

  col(column: ColumnDef): this {
    this._columns.push(column);
    return this;
  }

  foreignKey(fk: ForeignKeyCreateStatement): this {
    this._foreignKeys.push(fk);
    return this;
  }

  index(index: IndexCreateStatement): this {
    this._indexes.push(index);
    return this;
  }

  toSql(): string[] {
    const create = generateCreateTableSql(
      this._table,
      this._columns.map(c => c.definition),
      this._foreignKeys.map(fk => fk.definition),
      this._ifNotExists
    );
    const indexes = this._indexes.map(idx =>
      generateCreateIndexSql({ ...idx.definition, table: idx.definition.table ?? this._table })
    );
    return [create, ...indexes];
  }
}

export class TableAlterStatement {
  private _table = '';
  private readonly _operations: AlterOperation[] = [];

  table(name: string): this {
    this._table = name;
    return this;
  }

  addColumn(column: ColumnDef): this {
    this._operations.push({ type: 'addColumn', column: column.definition });
    return this;
  }

  dropColumn(name: string): this {
    this._operations.push({ type: 'dropColumn', name });
    return this;
  }

  modifyColumn(column: ColumnDef): this {
    this._operations.push({ type: 'modifyColumn', column: column.definition });
    return this;
  }

  toSql(): string[] {
    return generateAlterTableSql(this._table, this._operations);
  }
}

export class TableDropStatement {
  private _table = '';
  private _ifExists = false;

  table(name: string): this {
    this._table = name;
    return this;
  }

  ifExists(): this {
    this._ifExists = true;
    return this;
  }

  toSql(): string {
    return generateDropTableSql(this._table, this._ifExists);
  }
}

export const Table = {
  create: (): TableCreateStatement => new TableCreateStatement(),
  alter: (): TableAlterStatement => new TableAlterStatement(),
  drop: (): TableDropStatement => new TableDropStatement(),
};

export const ForeignKey = {
  create: (): ForeignKeyCreateStatement => new ForeignKeyCreateStatement(),
  drop: (): ForeignKeyDropStatement => new ForeignKeyDropStatement(),
};

export const Index = {
  create: (): IndexCreateStatement => new IndexCreateStatement(),
  drop: (): IndexDropStatement => new IndexDropStatement(),
};

/**
 * Target of a migration's `up` and `down` functions.
 */
export interface SchemaManager {
  createTable(statement: TableCreateStatement): Promise<void>;
  alterTable(statement: TableAlterStatement): Promise<void>;
  dropTable(statement: TableDropStatement): Promise<void>;
  createForeignKey(statement: ForeignKeyCreateStatement): Promise<void>;
  dropForeignKey(statement: ForeignKeyDropStatement): Promise<void>;
  createIndex(statement: IndexCreateStatement): Promise<void>;
  dropIndex(statement: IndexDropStatement): Promise<void>;
}

/**
 * Shape of a generated migration module.
 */
export interface Migration {
  up(manager: SchemaManager): Promise<void>;
  down(manager: SchemaManager): Promise<void>;
}

/**
 * Records the SQL each statement renders to, in call order.
 */
export class SqlSchemaManager implements SchemaManager {
  private readonly _statements: string[] = [];

  get statements(): readonly string[] {
    return this._statements;
  }

  async createTable(statement: TableCreateStatement): Promise<void> {
    this._statements.push(...statement.toSql());
  }

  async alterTable(statement: TableAlterStatement): Promise<void> {
    this._statements.push(...statement.toSql());
  }

  async dropTable(statement: TableDropStatement): Promise<void> {
    this._statements.push(statement.toSql());
  }

  async createForeignKey(statement: ForeignKeyCreateStatement): Promise<void> {
    this._statements.push(generateAddForeignKeySql(statement.definition));
  }

  async dropForeignKey(statement: ForeignKeyDropStatement): Promise<void> {
    this._statements.push(statement.toSql());
  }

  async createIndex(statement: IndexCreateStatement): Promise<void> {
    this._statements.push(generateCreateIndexSql(statement.definition));
  }

  async dropIndex(statement: IndexDropStatement): Promise<void> {
    this._statements.push(statement.toSql());
  }
}
