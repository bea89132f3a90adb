import ts from 'typescript';
import type { FkAction, ParsedFk, ParsedIndex } from './model';
import { isFkAction } from './model';

/**
 * Parse definition source into a syntax tree. The parser is tolerant: malformed
 * input still yields a tree, which simply matches nothing.
 */
export function parseSource(source: string, fileName = 'definition.ts'): ts.SourceFile {
  return ts.createSourceFile(fileName, source, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);
}

export interface ChainCall {
  readonly method: string;
  readonly args: readonly ts.Expression[];
}

export interface Chain {
  /** Expression the chain starts from, e.g. `model("User")` */
  readonly root: ts.Expression;
  /** Method calls in source order */
  readonly calls: readonly ChainCall[];
}

/**
 * Unroll `a.b(x).c(y)` into its root and the calls `b(x)`, `c(y)`.
 */
export function collectChain(expr: ts.Expression): Chain {
  const calls: ChainCall[] = [];
  let current = skipWrappers(expr);

  while (ts.isCallExpression(current) && ts.isPropertyAccessExpression(current.expression)) {
    calls.push({ method: current.expression.name.text, args: current.arguments });
    current = skipWrappers(current.expression.expression);
  }

  calls.reverse();
  return { root: current, calls };
}

function skipWrappers(expr: ts.Expression): ts.Expression {
  let current = expr;
  while (
    ts.isParenthesizedExpression(current)
    || ts.isNonNullExpression(current)
    || ts.isAwaitExpression(current)
  ) {
    current = current.expression;
  }
  return current;
}

/**
 * Name a call is made through: `b` for `a.b()`, `f` for `f()`.
 */
export function calleeName(call: ts.CallExpression): string | undefined {
  const callee = call.expression;
  if (ts.isPropertyAccessExpression(callee)) {
    return callee.name.text;
  }
  if (ts.isIdentifier(callee)) {
    return callee.text;
  }
  return undefined;
}

export function isStringLike(node: ts.Node): node is ts.StringLiteral | ts.NoSubstitutionTemplateLiteral {
  return ts.isStringLiteral(node) || ts.isNoSubstitutionTemplateLiteral(node);
}

export function stringArg(args: readonly ts.Expression[], position: number): string | undefined {
  const arg = args[position];
  return arg !== undefined && isStringLike(arg) ? arg.text : undefined;
}

/**
 * Pre-order search returning the first non-null result of `match`.
 */
export function findFirst<T>(node: ts.Node, match: (node: ts.Node) => T | null): T | null {
  const hit = match(node);
  if (hit !== null) {
    return hit;
  }
  return ts.forEachChild(node, child => findFirst(child, match) ?? undefined) ?? null;
}

/**
 * Visit every call below `node` (inclusive), children first, so the calls of
 * a chain come out in source order.
 */
export function forEachCallPostOrder(node: ts.Node, visit: (call: ts.CallExpression) => void): void {
  ts.forEachChild(node, child => forEachCallPostOrder(child, visit));
  if (ts.isCallExpression(node)) {
    visit(node);
  }
}

export function collectCalls(node: ts.Node, name: string): ts.CallExpression[] {
  const calls: ts.CallExpression[] = [];
  forEachCallPostOrder(node, call => {
    if (calleeName(call) === name) {
      calls.push(call);
    }
  });
  return calls;
}

export function findCall(node: ts.Node, name: string): ts.CallExpression | undefined {
  return collectCalls(node, name)[0];
}

export function methodNamesIn(node: ts.Node): string[] {
  const names: string[] = [];
  forEachCallPostOrder(node, call => {
    const name = calleeName(call);
    if (name !== undefined) {
      names.push(name);
    }
  });
  return names;
}

export function stringLiteralsIn(node: ts.Node): string[] {
  const strings: string[] = [];
  const visit = (n: ts.Node): void => {
    if (isStringLike(n)) {
      strings.push(n.text);
    }
    ts.forEachChild(n, visit);
  };
  visit(node);
  return strings;
}

export function firstStringLiteral(node: ts.Node): string | undefined {
  return findFirst(node, n => (isStringLike(n) ? n.text : null)) ?? undefined;
}

/**
 * Accepts `ForeignKeyAction.Cascade`, `Cascade` or `"Cascade"`.
 */
export function fkActionValue(expr: ts.Expression | undefined): FkAction {
  let text: string | undefined;
  if (expr === undefined) {
    text = undefined;
  } else if (ts.isPropertyAccessExpression(expr)) {
    text = expr.name.text;
  } else if (ts.isIdentifier(expr) || isStringLike(expr)) {
    text = expr.text;
  }
  return text !== undefined && isFkAction(text) ? text : 'NoAction';
}

function fkAction(node: ts.Node, method: string): FkAction {
  return fkActionValue(findCall(node, method)?.arguments[0]);
}

/**
 * Read a foreign key declaration in any supported shape:
 * `.from(table, column).to(table, column)`, `.column(c).references(t, c)`,
 * or `create("column").references(t)`. Returns null when no target table is named.
 */
export function parseForeignKeyExpr(expr: ts.Expression): ParsedFk | null {
  const from = findCall(expr, 'from');
  const column = findCall(expr, 'column');
  const fromColumn = (from && stringArg(from.arguments, 1))
    ?? (column && stringArg(column.arguments, 0))
    ?? firstStringLiteral(expr);

  const target = findCall(expr, 'to') ?? findCall(expr, 'references');
  const toTable = target && stringArg(target.arguments, 0);
  if (fromColumn === undefined || toTable === undefined || toTable === '') {
    return null;
  }

  const toColumnCall = findCall(expr, 'toColumn');
  const toColumn = (toColumnCall && stringArg(toColumnCall.arguments, 0))
    ?? (target && stringArg(target.arguments, 1))
    ?? 'id';

  return {
    fromColumn,
    toTable,
    toColumn,
    onDelete: fkAction(expr, 'onDelete'),
    onUpdate: fkAction(expr, 'onUpdate'),
  };
}

/**
 * Read an index declaration: either `.name(n).col(a).col(b)`, or a list of
 * string literals where the first is the name and the rest are columns.
 */
export function parseIndexExpr(expr: ts.Expression): ParsedIndex | null {
  const unique = methodNamesIn(expr).includes('unique');
  const nameCall = findCall(expr, 'name');
  const name = nameCall && stringArg(nameCall.arguments, 0);

  if (name !== undefined) {
    const columns = collectCalls(expr, 'col')
      .map(call => stringArg(call.arguments, 0))
      .filter((c): c is string => c !== undefined);
    return { name, columns, unique };
  }

  const strings = stringLiteralsIn(expr);
  if (strings.length === 0) {
    return null;
  }
  return { name: strings[0], columns: strings.slice(1), unique };
}
