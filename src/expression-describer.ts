/**
 * Expression Describer
 *
 * Renders an expression as a canonical dotted path, used both as a mutation
 * target and as an action's source label:
 * - `state.counter`            member access
 * - `ui.button()`              method call (arguments dropped)
 * - `state.items[..]`          any indexing
 * - `<expr>`                   everything else
 */

import * as t from '@babel/types';
import { asMethodCall } from './utils';

export const UNKNOWN_EXPRESSION = '<expr>';

export function describeExpression(node: t.Node | null | undefined): string {
  if (!node) return UNKNOWN_EXPRESSION;

  if (t.isIdentifier(node)) {
    return node.name;
  }

  if (t.isThisExpression(node)) {
    return 'this';
  }

  if (t.isSuper(node)) {
    return 'super';
  }

  if (t.isMemberExpression(node) || t.isOptionalMemberExpression(node)) {
    const base = describeExpression(node.object);
    if (node.computed) {
      return `${base}[..]`;
    }
    if (t.isIdentifier(node.property)) {
      return `${base}.${node.property.name}`;
    }
    if (t.isPrivateName(node.property)) {
      return `${base}.#${node.property.id.name}`;
    }
    return UNKNOWN_EXPRESSION;
  }

  const call = asMethodCall(node);
  if (call) {
    return `${describeExpression(call.receiver)}.${call.method}()`;
  }

  // Parentheses and type-level wrappers are transparent
  if (
    t.isParenthesizedExpression(node) ||
    t.isTSNonNullExpression(node) ||
    t.isTSAsExpression(node) ||
    t.isTSSatisfiesExpression(node) ||
    t.isTSTypeAssertion(node) ||
    t.isTypeCastExpression(node)
  ) {
    return describeExpression(node.expression);
  }

  return UNKNOWN_EXPRESSION;
}
