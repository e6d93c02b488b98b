/**
 * UI Element Resolver
 *
 * Finds the UI element an expression refers to. Handles:
 * - Constructing calls: `ui.button("Save")`
 * - Chains ending after the constructor: `ui.button("Save").onHoverText("...")`
 * - Response bindings: `const r = ui.button("Save"); r.clicked()`
 *
 * Every input resolves to some element; unresolvable references come back as
 * 'response_var' or 'unknown' sentinels rather than errors.
 */

import * as t from '@babel/types';
import { BindingTable, UiElement, Vocabularies } from './types';
import { asMethodCall, getLine, unwrapExpression } from './utils';

export const RESPONSE_VAR_ELEMENT = 'response_var';
export const UNKNOWN_ELEMENT = 'unknown';

export interface ResolveContext {
  filePath: string;
  /** Enclosing function name ('' at module level) */
  context: string;
  bindings: BindingTable;
  vocabularies: Vocabularies;
}

/**
 * Resolve an expression to a UI element, following method chains and
 * consulting the binding table for bare variable references.
 */
export function resolveUiElement(node: t.Node, ctx: ResolveContext): UiElement {
  const constructed = resolveConstruction(node, ctx);
  if (constructed) {
    return constructed;
  }

  const inner = unwrapExpression(node);
  // Walk back down the chain to the innermost receiver
  const root = chainRoot(inner);

  // `this.response().clicked()` has `this` as its root path
  const name = t.isIdentifier(root) ? root.name : t.isThisExpression(root) ? 'this' : null;
  if (name !== null) {
    const bound = ctx.bindings.get(name);
    if (bound) {
      // Report where the alias is used, not where it was declared
      return {
        ...bound,
        context: ctx.context,
        filePath: ctx.filePath,
        line: getLine(root),
        responseVar: name,
      };
    }

    return {
      elementType: RESPONSE_VAR_ELEMENT,
      label: name,
      context: ctx.context,
      filePath: ctx.filePath,
      line: getLine(root),
      responseVar: name,
    };
  }

  return {
    elementType: UNKNOWN_ELEMENT,
    context: ctx.context,
    filePath: ctx.filePath,
    line: getLine(root),
  };
}

/**
 * Construction path only: find a UI-constructor call in the receiver chain.
 * Returns null where resolveUiElement would fall back to a variable lookup
 * or a sentinel.
 */
export function resolveConstruction(node: t.Node, ctx: ResolveContext): UiElement | null {
  const inner = unwrapExpression(node);
  const call = asMethodCall(inner);
  if (!call) {
    return null;
  }

  if (ctx.vocabularies.uiMethods.has(call.method)) {
    return {
      elementType: call.method,
      label: extractFirstStringArgument(call.args),
      context: ctx.context,
      filePath: ctx.filePath,
      line: getLine(call.node),
    };
  }

  return resolveConstruction(call.receiver, ctx);
}

/**
 * First string-literal argument, scanning left to right and looking through
 * parentheses and type wrappers.
 */
export function extractFirstStringArgument(
  args: t.CallExpression['arguments']
): string | undefined {
  for (const arg of args) {
    const value = extractStringLiteral(arg);
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

function extractStringLiteral(node: t.Node): string | undefined {
  const inner = unwrapExpression(node);

  if (t.isStringLiteral(inner)) {
    return inner.value;
  }

  // `label` with no interpolations is a plain string
  if (t.isTemplateLiteral(inner) && inner.expressions.length === 0) {
    const quasi = inner.quasis[0];
    return quasi?.value.cooked ?? quasi?.value.raw;
  }

  return undefined;
}

/**
 * Receiver at the bottom of a method chain.
 * `r.onHoverText("x")` -> `r`, `(r)` -> `r`, anything else -> itself.
 */
function chainRoot(node: t.Node): t.Node {
  const call = asMethodCall(node);
  return call ? chainRoot(unwrapExpression(call.receiver)) : node;
}
