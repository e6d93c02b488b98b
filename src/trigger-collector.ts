/**
 * Trigger Collector
 *
 * Flattens an `if` test into (UI element, action) pairs:
 * - `a.clicked() || b.clicked()`  -> two triggers, one per disjunct
 * - `a.clicked() && b.hovered()`  -> also two triggers (conjunctions are not
 *                                    modelled as joint triggers)
 * - `(r.changed())`               -> one trigger
 * - `!r.clicked()`, `x > 0`, ...  -> nothing
 */

import * as t from '@babel/types';
import { Trigger } from './types';
import { describeExpression } from './expression-describer';
import { ResolveContext, resolveUiElement } from './ui-element-resolver';
import { asMethodCall, getLine, unwrapExpression } from './utils';

export function collectTriggers(condition: t.Node, ctx: ResolveContext): Trigger[] {
  const triggers: Trigger[] = [];
  visitCondition(condition, ctx, triggers);
  return triggers;
}

function visitCondition(node: t.Node, ctx: ResolveContext, triggers: Trigger[]): void {
  const inner = unwrapExpression(node);

  if (t.isLogicalExpression(inner) && (inner.operator === '||' || inner.operator === '&&')) {
    visitCondition(inner.left, ctx, triggers);
    visitCondition(inner.right, ctx, triggers);
    return;
  }

  const call = asMethodCall(inner);
  if (!call || !ctx.vocabularies.actionMethods.has(call.method)) {
    return;
  }

  const uiElement = resolveUiElement(call.receiver, ctx);
  triggers.push([
    uiElement,
    {
      actionType: call.method,
      source: describeExpression(call.receiver),
      context: ctx.context,
      filePath: ctx.filePath,
      line: getLine(call.node),
    },
  ]);
}
