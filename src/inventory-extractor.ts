/**
 * Inventory Extractor
 *
 * File-wide lists of every UI element, action query and state mutation,
 * independent of which `if` (if any) they sit in. The flow extractor answers
 * "what causes what"; these answer "what is there".
 */

import traverse from '@babel/traverse';
import * as t from '@babel/types';
import { Action, ExtractOptions, StateMutation, UiElement, Vocabularies } from './types';
import { DEFAULT_VOCABULARIES } from './vocabularies';
import { describeExpression } from './expression-describer';
import { extractFirstStringArgument } from './ui-element-resolver';
import { classifyMutation, isLikelyStateTarget } from './mutation-collector';
import { ScopeStack } from './scope-stack';
import { asMethodCall, getLine, MethodCall, unwrapExpression } from './utils';

type MethodCallVisitor = (call: MethodCall, context: string) => void;

/** Walk every method call in the file along with its enclosing function name */
function visitMethodCalls(ast: t.File | t.Program, onCall: MethodCallVisitor): void {
  const scopes = new ScopeStack(() => null);
  const visit = (path: { node: t.Node }) => {
    const call = asMethodCall(path.node);
    if (call) onCall(call, scopes.context);
  };

  traverse(ast, {
    ...scopes.visitor(),
    noScope: true,
    CallExpression: visit,
    OptionalCallExpression: visit,
  });
}

/**
 * `ui.button('Save')`, `this.ui.label(...)`, `ui.horizontal(...).add(...)`:
 * UI constructors and display widgets called on something that looks like a
 * UI handle.
 */
export function extractUiElements(
  filePath: string,
  ast: t.File | t.Program,
  options: ExtractOptions = {}
): UiElement[] {
  const vocabularies = options.vocabularies ?? DEFAULT_VOCABULARIES;
  const elements: UiElement[] = [];

  visitMethodCalls(ast, (call, context) => {
    if (!isInventoryUiMethod(call.method, vocabularies) || !isUiReceiver(call.receiver)) return;

    elements.push({
      elementType: call.method,
      label: extractFirstStringArgument(call.args),
      context,
      filePath,
      line: getLine(call.node),
    });
  });

  return elements;
}

/** Every action or status query, whatever its receiver */
export function extractActions(
  filePath: string,
  ast: t.File | t.Program,
  options: ExtractOptions = {}
): Action[] {
  const vocabularies = options.vocabularies ?? DEFAULT_VOCABULARIES;
  const actions: Action[] = [];

  visitMethodCalls(ast, (call, context) => {
    if (!vocabularies.actionMethods.has(call.method) && !vocabularies.statusMethods.has(call.method)) {
      return;
    }

    actions.push({
      actionType: call.method,
      source: describeExpression(call.receiver),
      context,
      filePath,
      line: getLine(call.node),
    });
  });

  return actions;
}

/** Every state-like mutation in the file, conditional or not */
export function extractStateMutations(
  filePath: string,
  ast: t.File | t.Program,
  options: ExtractOptions = {}
): StateMutation[] {
  const vocabularies = options.vocabularies ?? DEFAULT_VOCABULARIES;
  const scopes = new ScopeStack(() => null);
  const mutations: StateMutation[] = [];

  const record = (path: { node: t.Node }) => {
    const site = classifyMutation(path.node, vocabularies);
    if (!site || !isLikelyStateTarget(site.target)) return;
    mutations.push({ ...site, context: scopes.context, filePath, line: getLine(path.node) });
  };

  traverse(ast, {
    ...scopes.visitor(),
    noScope: true,
    AssignmentExpression: record,
    UpdateExpression: record,
    CallExpression: record,
    OptionalCallExpression: record,
  });

  return mutations;
}

function isInventoryUiMethod(method: string, vocabularies: Vocabularies): boolean {
  return vocabularies.uiMethods.has(method) || vocabularies.displayMethods.has(method);
}

/**
 * Name-based guess at a UI handle: `ui`, `childUi`, `this.ui`, `ctx.ui()`,
 * or a chain built on one of those.
 */
export function isUiReceiver(node: t.Node): boolean {
  const inner = unwrapExpression(node);

  if (t.isIdentifier(inner)) {
    return looksLikeUiName(inner.name);
  }

  if (
    (t.isMemberExpression(inner) || t.isOptionalMemberExpression(inner)) &&
    !inner.computed &&
    t.isIdentifier(inner.property)
  ) {
    return looksLikeUiName(inner.property.name);
  }

  const call = asMethodCall(inner);
  if (call) {
    return call.method === 'ui' || isUiReceiver(call.receiver);
  }

  return false;
}

function looksLikeUiName(name: string): boolean {
  return name.includes('ui') || name.endsWith('Ui');
}
