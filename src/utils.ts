/**
 * Shared Utilities for UI Flow Extractor
 *
 * AST helpers used across the analyzer modules.
 */

import * as t from '@babel/types';

/** A `receiver.method(args)` call, optional chaining included */
export interface MethodCall {
  node: t.CallExpression | t.OptionalCallExpression;
  receiver: t.Expression | t.Super;
  method: string;
  args: t.CallExpression['arguments'];
}

/**
 * Strip wrappers that do not change which value an expression denotes:
 * parentheses and TypeScript/Flow type-level wrappers (`x!`, `x as T`,
 * `x satisfies T`, `<T>x`, `(x: T)`).
 */
export function unwrapExpression(node: t.Node): t.Node {
  let current = node;
  while (
    t.isParenthesizedExpression(current) ||
    t.isTSNonNullExpression(current) ||
    t.isTSAsExpression(current) ||
    t.isTSSatisfiesExpression(current) ||
    t.isTSTypeAssertion(current) ||
    t.isTypeCastExpression(current)
  ) {
    current = current.expression;
  }
  return current;
}

/**
 * Match a method call: a call whose callee is a non-computed member access
 * with a plain identifier as the method name.
 */
export function asMethodCall(node: t.Node | null | undefined): MethodCall | null {
  if (!node || !(t.isCallExpression(node) || t.isOptionalCallExpression(node))) {
    return null;
  }

  const callee = node.callee;
  if (!t.isMemberExpression(callee) && !t.isOptionalMemberExpression(callee)) {
    return null;
  }
  if (callee.computed || !t.isIdentifier(callee.property)) {
    return null;
  }

  return {
    node,
    receiver: callee.object,
    method: callee.property.name,
    args: node.arguments,
  };
}

/** 1-based start line of a node, 0 when the tree carries no positions */
export function getLine(node: t.Node): number {
  return node.loc?.start.line || 0;
}

/**
 * Whether informational output may go to the console.
 * Machine-readable output modes and test runs keep stdout clean.
 */
export function shouldLogToConsole(): boolean {
  return (
    process.env.NODE_ENV !== 'test' &&
    !process.argv.includes('--json') &&
    !process.argv.includes('--mermaid') &&
    !process.argv.includes('--summary') &&
    !process.argv.includes('--inventory')
  );
}
