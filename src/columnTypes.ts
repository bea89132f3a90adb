import type { ColumnType } from './model';

interface TypeRule {
  readonly tokens: readonly string[];
  readonly type: ColumnType;
}

/**
 * Call names that imply a column type, most specific first.
 * The first rule with a token present in a column declaration wins.
 */
const COLUMN_TYPE_RULES: readonly TypeRule[] = [
  // Binary
  { tokens: ['blob'], type: 'Blob' },
  { tokens: ['binary', 'binaryLen'], type: 'Binary' },
  { tokens: ['varBinary'], type: 'VarBinary' },
  // Text
  { tokens: ['text'], type: 'Text' },
  { tokens: ['char', 'charLen'], type: 'Char' },
  { tokens: ['varchar', 'stringLen'], type: 'String' },
  // Integers
  { tokens: ['tinyInteger'], type: 'TinyInteger' },
  { tokens: ['smallInteger'], type: 'SmallInteger' },
  { tokens: ['bigUnsigned'], type: 'BigUnsigned' },
  { tokens: ['unsigned'], type: 'Unsigned' },
  { tokens: ['bigInteger'], type: 'BigInteger' },
  { tokens: ['integer'], type: 'Integer' },
  // Numeric
  { tokens: ['float'], type: 'Float' },
  { tokens: ['double'], type: 'Double' },
  { tokens: ['decimal', 'decimalLen'], type: 'Decimal' },
  { tokens: ['boolean'], type: 'Boolean' },
  // Temporal
  { tokens: ['timestampTz', 'timestampWithTimeZone'], type: 'TimestampWithTimeZone' },
  { tokens: ['timestamp'], type: 'Timestamp' },
  { tokens: ['dateTime', 'datetime', 'autoNow', 'autoNowUpdate'], type: 'DateTime' },
  { tokens: ['date'], type: 'Date' },
  { tokens: ['time'], type: 'Time' },
  { tokens: ['uuid'], type: 'Uuid' },
  { tokens: ['jsonBinary'], type: 'JsonBinary' },
  { tokens: ['json'], type: 'Json' },
  // PostgreSQL
  { tokens: ['inet'], type: 'Inet' },
  { tokens: ['cidr'], type: 'Cidr' },
  { tokens: ['macAddress'], type: 'MacAddr' },
  { tokens: ['interval'], type: 'Interval' },
  { tokens: ['enumType', 'enumeration'], type: 'Enum' },
];

const PRIMARY_KEY_TYPE_RULES: readonly TypeRule[] = [
  { tokens: ['uuid'], type: 'Uuid' },
  { tokens: ['i64', 'bigInteger'], type: 'BigInteger' },
  { tokens: ['i32', 'integer'], type: 'Integer' },
  { tokens: ['i16', 'smallInteger'], type: 'SmallInteger' },
  { tokens: ['i8', 'tinyInteger'], type: 'TinyInteger' },
  { tokens: ['u64', 'bigUnsigned'], type: 'BigUnsigned' },
  { tokens: ['u32', 'unsigned'], type: 'Unsigned' },
  { tokens: ['string', 'varchar'], type: 'String' },
];

function matchRule(rules: readonly TypeRule[], methods: readonly string[], fallback: ColumnType): ColumnType {
  const present = new Set(methods);
  const rule = rules.find(r => r.tokens.some(t => present.has(t)));
  return rule?.type ?? fallback;
}

export function detectColumnType(methods: readonly string[]): ColumnType {
  return matchRule(COLUMN_TYPE_RULES, methods, 'String');
}

export function detectPrimaryKeyType(methods: readonly string[]): ColumnType {
  return matchRule(PRIMARY_KEY_TYPE_RULES, methods, 'Integer');
}

interface ColumnTypeInfo {
  /** Statement-builder method written into generated artifacts */
  readonly method: string;
  readonly sql: string;
  /** TypeScript value type used by the model binding */
  readonly tsType: string;
}

const COLUMN_TYPE_INFO: Readonly<Record<ColumnType, ColumnTypeInfo>> = {
  TinyInteger: { method: 'tinyInteger', sql: 'smallint', tsType: 'number' },
  SmallInteger: { method: 'smallInteger', sql: 'smallint', tsType: 'number' },
  Integer: { method: 'integer', sql: 'integer', tsType: 'number' },
  BigInteger: { method: 'bigInteger', sql: 'bigint', tsType: 'bigint' },
  Unsigned: { method: 'unsigned', sql: 'integer', tsType: 'number' },
  BigUnsigned: { method: 'bigUnsigned', sql: 'bigint', tsType: 'bigint' },
  Float: { method: 'float', sql: 'real', tsType: 'number' },
  Double: { method: 'double', sql: 'double precision', tsType: 'number' },
  Decimal: { method: 'decimal', sql: 'numeric', tsType: 'string' },
  Boolean: { method: 'boolean', sql: 'boolean', tsType: 'boolean' },
  String: { method: 'string', sql: 'varchar', tsType: 'string' },
  Text: { method: 'text', sql: 'text', tsType: 'string' },
  Char: { method: 'char', sql: 'char', tsType: 'string' },
  DateTime: { method: 'dateTime', sql: 'timestamp', tsType: 'Date' },
  Timestamp: { method: 'timestamp', sql: 'timestamp', tsType: 'Date' },
  TimestampWithTimeZone: { method: 'timestampTz', sql: 'timestamptz', tsType: 'Date' },
  Date: { method: 'date', sql: 'date', tsType: 'Date' },
  Time: { method: 'time', sql: 'time', tsType: 'string' },
  Uuid: { method: 'uuid', sql: 'uuid', tsType: 'string' },
  Json: { method: 'json', sql: 'json', tsType: 'unknown' },
  JsonBinary: { method: 'jsonBinary', sql: 'jsonb', tsType: 'unknown' },
  Binary: { method: 'binary', sql: 'bytea', tsType: 'Uint8Array' },
  VarBinary: { method: 'varBinary', sql: 'bytea', tsType: 'Uint8Array' },
  Blob: { method: 'blob', sql: 'bytea', tsType: 'Uint8Array' },
  Inet: { method: 'inet', sql: 'inet', tsType: 'string' },
  Cidr: { method: 'cidr', sql: 'cidr', tsType: 'string' },
  MacAddr: { method: 'macAddress', sql: 'macaddr', tsType: 'string' },
  Interval: { method: 'interval', sql: 'interval', tsType: 'string' },
  Enum: { method: 'enumType', sql: 'text', tsType: 'string' },
};

export function columnTypeMethod(type: ColumnType): string {
  return COLUMN_TYPE_INFO[type].method;
}

export function columnTypeSql(type: ColumnType): string {
  return COLUMN_TYPE_INFO[type].sql;
}

export function columnTypeTs(type: ColumnType): string {
  return COLUMN_TYPE_INFO[type].tsType;
}

const INTEGER_TYPES: ReadonlySet<ColumnType> = new Set<ColumnType>([
  'TinyInteger',
  'SmallInteger',
  'Integer',
  'BigInteger',
  'Unsigned',
  'BigUnsigned',
]);

export function isIntegerType(type: ColumnType): boolean {
  return INTEGER_TYPES.has(type);
}
