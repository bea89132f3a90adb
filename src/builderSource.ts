import ts from 'typescript';
import type { ParsedSchema } from './model';
import { createColumn } from './model';
import {
  collectChain,
  findFirst,
  firstStringLiteral,
  isStringLike,
  methodNamesIn,
  parseForeignKeyExpr,
  parseIndexExpr,
  parseSource,
  stringArg,
} from './astHelpers';
import { detectColumnType, detectPrimaryKeyType } from './columnTypes';
import { SchemaModel, toSnakeCase } from './schemaModel';
import type { SchemaSource } from './sourceExtractor';

/**
 * Reads declarative model definitions:
 *
 * ```ts
 * export const users = model("Users")
 *   .tableName("users")
 *   .primaryKey(PrimaryKeyDef.create("id").i32())
 *   .column(ColumnDef.create("username").string().required().unique())
 *   .foreignKey(ForeignKeyDef.create("team_id").references("teams").onDelete(ForeignKeyAction.Cascade))
 *   .index(IndexDef.create("idx_users_username", "username"))
 *   .build();
 * ```
 *
 * The first call chain containing `build` wins.
 */
export class BuilderSchemaSource implements SchemaSource {
  readonly name = 'builder';

  extract(source: string, fileName?: string): ParsedSchema | null {
    const sourceFile = parseSource(source, fileName);
    return findFirst(sourceFile, node => (ts.isCallExpression(node) ? parseBuilderChain(node) : null));
  }
}

function parseBuilderChain(call: ts.CallExpression): ParsedSchema | null {
  const { root, calls } = collectChain(call);
  if (!calls.some(c => c.method === 'build')) {
    return null;
  }

  let tableName = modelRootName(root);
  const model = new SchemaModel(tableName ?? '');

  for (const { method, args } of calls) {
    const arg = args[0];
    switch (method) {
      case 'tableName': {
        const name = stringArg(args, 0);
        if (name !== undefined) {
          tableName = name;
        }
        break;
      }
      case 'primaryKey': {
        const name = arg && firstStringLiteral(arg);
        if (arg && name !== undefined) {
          model.setPrimaryKey(createColumn(name, detectPrimaryKeyType(methodNamesIn(arg))));
        }
        break;
      }
      case 'column': {
        const name = arg && firstStringLiteral(arg);
        if (arg && name !== undefined) {
          const methods = methodNamesIn(arg);
          model.addColumn(createColumn(name, detectColumnType(methods), {
            nullable: methods.some(m => m === 'nullable' || m === 'autoNow' || m === 'autoNowUpdate'),
            unique: methods.includes('unique'),
            ignored: methods.some(m => m === 'ignore' || m === 'ignored'),
          }));
        }
        break;
      }
      case 'foreignKey': {
        const fk = arg && parseForeignKeyExpr(arg);
        if (fk) {
          model.addForeignKey(fk);
        }
        break;
      }
      case 'index': {
        const index = arg && parseIndexExpr(arg);
        if (index) {
          model.addIndex(index);
        }
        break;
      }
    }
  }

  if (tableName === undefined || tableName === '') {
    return null;
  }
  return model.setTableName(tableName).toParsedSchema();
}

/**
 * `model("BlogPost")` → `blog_post`
 */
function modelRootName(root: ts.Expression): string | undefined {
  if (!ts.isCallExpression(root) || !ts.isIdentifier(root.expression) || root.expression.text !== 'model') {
    return undefined;
  }
  const arg = root.arguments[0];
  return arg !== undefined && isStringLike(arg) ? toSnakeCase(arg.text) : undefined;
}
