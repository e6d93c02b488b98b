/**
 * Mutation Collector
 *
 * Collects the state mutations performed directly in the body of one `if`:
 * - `state.count = 0`          assign
 * - `state.count += 1`         add_assign (likewise -=, *=, /=)
 * - `state.count++`            add_assign (`--` -> sub_assign)
 * - `state.items.push(x)`      method:push
 *
 * Nested `if` statements are skipped: their mutations are gated by their own
 * condition and are attributed when the flow extractor reaches them.
 */

import traverse, { NodePath } from '@babel/traverse';
import * as t from '@babel/types';
import { MutationType, StateMutation, Vocabularies } from './types';
import { describeExpression } from './expression-describer';
import { asMethodCall, getLine } from './utils';

export interface MutationContext {
  filePath: string;
  context: string;
  vocabularies: Vocabularies;
}

/**
 * Heuristic, not a type check: a target counts as state if it is a dotted
 * path, a `self.` path, mentions `state`, or is a dereference.
 */
export function isLikelyStateTarget(target: string): boolean {
  return (
    target.includes('.') ||
    target.startsWith('self.') ||
    target.includes('state') ||
    target.startsWith('*')
  );
}

/** Target and kind of one mutating expression, before any state filter */
export interface MutationSite {
  target: string;
  mutationType: MutationType;
}

/**
 * Classify an assignment, update expression or method call as a mutation,
 * or null when it is none of the recorded kinds.
 */
export function classifyMutation(node: t.Node, vocabularies: Vocabularies): MutationSite | null {
  if (t.isAssignmentExpression(node)) {
    const mutationType =
      node.operator === '=' ? 'assign' : vocabularies.compoundAssignOperators.get(node.operator);
    return mutationType ? { target: describeExpression(node.left), mutationType } : null;
  }

  if (t.isUpdateExpression(node)) {
    const mutationType = vocabularies.compoundAssignOperators.get(node.operator);
    return mutationType ? { target: describeExpression(node.argument), mutationType } : null;
  }

  const call = asMethodCall(node);
  if (call && vocabularies.mutatingMethods.has(call.method)) {
    return { target: describeExpression(call.receiver), mutationType: `method:${call.method}` };
  }

  return null;
}

export function collectMutations(body: t.Statement, ctx: MutationContext): StateMutation[] {
  const mutations: StateMutation[] = [];

  // `if (a) if (b) ...` - the body is itself a nested conditional
  if (t.isIfStatement(body)) {
    return mutations;
  }

  const record = (path: { node: t.Node }) => {
    const site = classifyMutation(path.node, ctx.vocabularies);
    if (!site || !isLikelyStateTarget(site.target)) return;
    mutations.push({
      ...site,
      context: ctx.context,
      filePath: ctx.filePath,
      line: getLine(path.node),
    });
  };

  traverse(body, {
    noScope: true,

    IfStatement(path: NodePath<t.IfStatement>) {
      path.skip();
    },

    AssignmentExpression: record,
    UpdateExpression: record,
    CallExpression: record,
    OptionalCallExpression: record,
  });

  return mutations;
}
