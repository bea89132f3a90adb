import ts from 'typescript';
import type { ParsedSchema } from './model';
import { createColumn } from './model';
import {
  calleeName,
  findFirst,
  firstStringLiteral,
  forEachCallPostOrder,
  methodNamesIn,
  parseForeignKeyExpr,
  parseIndexExpr,
  parseSource,
  stringArg,
} from './astHelpers';
import { detectColumnType } from './columnTypes';
import { SchemaModel } from './schemaModel';
import type { SchemaSource } from './sourceExtractor';

/**
 * Reads migration modules written against the statement builders:
 *
 * ```ts
 * export async function up(manager: SchemaManager): Promise<void> {
 *   await manager.createTable(
 *     Table.create()
 *       .table("users")
 *       .col(ColumnDef.create("id").integer().notNull().autoIncrement().primaryKey())
 *       .col(ColumnDef.create("email").string().notNull().unique())
 *   );
 *   await manager.createIndex(Index.create().name("idx_users_email").table("users").col("email"));
 * }
 * ```
 *
 * Only the body of `up` is read. Foreign keys and indexes are accepted both as
 * standalone `createForeignKey`/`createIndex` statements and inline on the
 * table statement via `.foreignKey(...)`/`.index(...)`.
 */
export class StatementSchemaSource implements SchemaSource {
  readonly name = 'statement';

  extract(source: string, fileName?: string): ParsedSchema | null {
    const body = findUpBody(parseSource(source, fileName));
    if (body === null) {
      return null;
    }

    let tableName: string | undefined;
    const model = new SchemaModel('');

    forEachCallPostOrder(body, call => {
      const arg = call.arguments[0];
      if (!ts.isPropertyAccessExpression(call.expression) || arg === undefined) {
        return;
      }

      switch (calleeName(call)) {
        case 'table':
          tableName ??= stringArg(call.arguments, 0);
          break;
        case 'col': {
          // Index statements also use `col`, with a bare column name
          if (!ts.isCallExpression(arg)) {
            break;
          }
          const name = firstStringLiteral(arg);
          if (name === undefined) {
            break;
          }
          const methods = methodNamesIn(arg);
          const colType = detectColumnType(methods);
          if (methods.includes('primaryKey')) {
            model.setPrimaryKey(createColumn(name, colType));
          } else {
            model.addColumn(createColumn(name, colType, {
              nullable: methods.includes('null'),
              unique: methods.includes('unique'),
            }));
          }
          break;
        }
        case 'createForeignKey':
        case 'foreignKey': {
          const fk = parseForeignKeyExpr(arg);
          if (fk) {
            model.addForeignKey(fk);
          }
          break;
        }
        case 'createIndex':
        case 'index': {
          const index = parseIndexExpr(arg);
          if (index) {
            model.addIndex(index);
          }
          break;
        }
      }
    });

    if (tableName === undefined || tableName === '') {
      return null;
    }
    return model.setTableName(tableName).toParsedSchema();
  }
}

function findUpBody(sourceFile: ts.SourceFile): ts.Node | null {
  return findFirst<ts.Node>(sourceFile, node => {
    if ((ts.isFunctionDeclaration(node) || ts.isMethodDeclaration(node)) && isNamed(node.name, 'up')) {
      return node.body ?? null;
    }
    if ((ts.isVariableDeclaration(node) || ts.isPropertyAssignment(node)) && isNamed(node.name, 'up')) {
      const init = node.initializer;
      if (init !== undefined && (ts.isArrowFunction(init) || ts.isFunctionExpression(init))) {
        return init.body;
      }
    }
    return null;
  });
}

function isNamed(name: ts.Node | undefined, expected: string): boolean {
  return name !== undefined && (ts.isIdentifier(name) || ts.isStringLiteral(name)) && name.text === expected;
}
