/**
 * TEA Extractor
 *
 * Message flows in Elm-architecture code, where views emit messages and a
 * single `update` function applies them:
 *
 *   Button.primary('+').onClick(ctx, Msg.Increment)     // emission
 *
 *   function update(model, msg) {
 *     switch (msg) {
 *       case Msg.Increment:                             // handler
 *         model.count += 1;
 *         break;
 *     }
 *   }
 *
 * Emissions and handlers are joined by message name into TeaFlows.
 */

import traverse, { NodePath } from '@babel/traverse';
import * as t from '@babel/types';
import {
  ExtractOptions,
  MsgEmission,
  MsgHandler,
  StateMutation,
  TeaFlow,
  Vocabularies,
} from './types';
import { DEFAULT_VOCABULARIES } from './vocabularies';
import { describeExpression } from './expression-describer';
import { extractFirstStringArgument } from './ui-element-resolver';
import { classifyMutation } from './mutation-collector';
import { ScopeStack } from './scope-stack';
import { asMethodCall, getLine, unwrapExpression } from './utils';

const UPDATE_FUNCTION = 'update';
const MODEL_PREFIXES = ['model.', 'state.', 'this.'];

interface DsComponent {
  component: string;
  variant: string;
  label?: string;
}

/** `Button.primary('+').onClick(ctx, Msg.Increment)` and friends */
export function extractMsgEmissions(
  filePath: string,
  ast: t.File | t.Program,
  options: ExtractOptions = {}
): MsgEmission[] {
  const vocabularies = options.vocabularies ?? DEFAULT_VOCABULARIES;
  const scopes = new ScopeStack(() => null);
  const emissions: MsgEmission[] = [];

  const visit = (path: { node: t.Node }) => {
    const call = asMethodCall(path.node);
    if (!call || !vocabularies.dsActions.has(call.method)) return;

    const msg = extractMessage(call.args);
    if (msg === null) return;

    const component = findDsComponent(call.receiver, vocabularies);
    if (!component) return;

    emissions.push({
      ...component,
      action: call.method,
      msg,
      context: scopes.context,
      filePath,
      line: getLine(call.node),
    });
  };

  traverse(ast, {
    ...scopes.visitor(),
    noScope: true,
    CallExpression: visit,
    OptionalCallExpression: visit,
  });

  return emissions;
}

/** Cases of `switch (msg)` inside a function named `update` that change the model */
export function extractMsgHandlers(
  filePath: string,
  ast: t.File | t.Program,
  options: ExtractOptions = {}
): MsgHandler[] {
  const vocabularies = options.vocabularies ?? DEFAULT_VOCABULARIES;
  const scopes = new ScopeStack(() => null);
  const handlers: MsgHandler[] = [];

  traverse(ast, {
    ...scopes.visitor(),
    noScope: true,

    SwitchStatement(path: NodePath<t.SwitchStatement>) {
      if (scopes.context !== UPDATE_FUNCTION) return;
      if (!isMessageDiscriminant(path.node.discriminant)) return;

      handlers.push(...handlersFromCases(path.node.cases, filePath, vocabularies));
    },
  });

  return handlers;
}

/**
 * Pair each emission with the first handler for its message. Names match
 * exactly or by their last segment: `Msg.Increment` matches both
 * `case Msg.Increment` and `case 'Increment'`.
 */
export function buildTeaFlows(emissions: MsgEmission[], handlers: MsgHandler[]): TeaFlow[] {
  return emissions.map((emission) => ({
    emission,
    handler: handlers.find((handler) => messagesMatch(emission.msg, handler.msgPattern)) ?? null,
  }));
}

function messagesMatch(msg: string, pattern: string): boolean {
  return (
    msg === pattern ||
    msg.endsWith(`.${pattern}`) ||
    pattern.endsWith(`.${lastSegment(msg)}`)
  );
}

function lastSegment(name: string): string {
  return name.slice(name.lastIndexOf('.') + 1);
}

/**
 * The message argument. A leading context argument is skipped, so the
 * first argument after it that reads as a message wins; a lone argument is
 * taken as is.
 */
function extractMessage(args: t.CallExpression['arguments']): string | null {
  for (const arg of [...args.slice(1), ...args.slice(0, 1)]) {
    const msg = describeMessage(arg);
    if (msg.includes('.') || msg.startsWith('Msg')) {
      return msg;
    }
  }
  return null;
}

/** `Msg.Increment` -> 'Msg.Increment', `Msg.SetName(value)` -> 'Msg.SetName' */
function describeMessage(node: t.Node): string {
  const inner = unwrapExpression(node);
  if (t.isCallExpression(inner) || t.isOptionalCallExpression(inner)) {
    return describeExpression(inner.callee);
  }
  return describeExpression(inner);
}

/**
 * Component at the bottom of the receiver chain:
 * `Button.primary('+')` -> Button/primary, `new Input('Name')` -> Input/new.
 */
function findDsComponent(node: t.Node, vocabularies: Vocabularies): DsComponent | null {
  const inner = unwrapExpression(node);

  if (t.isNewExpression(inner)) {
    const component = componentName(inner.callee);
    if (component !== null && vocabularies.dsComponents.has(component)) {
      return { component, variant: 'new', label: extractFirstStringArgument(inner.arguments) };
    }
    return null;
  }

  const call = asMethodCall(inner);
  if (!call) return null;

  const component = componentName(call.receiver);
  if (component !== null && vocabularies.dsComponents.has(component)) {
    return { component, variant: call.method, label: extractFirstStringArgument(call.args) };
  }

  return findDsComponent(call.receiver, vocabularies);
}

/** `Button` or `ds.Button` -> 'Button' */
function componentName(node: t.Node): string | null {
  const inner = unwrapExpression(node);
  if (t.isIdentifier(inner)) return inner.name;
  if (t.isMemberExpression(inner) && !inner.computed && t.isIdentifier(inner.property)) {
    return inner.property.name;
  }
  return null;
}

/** `msg`, `msg.type`, `action.msg`, `nextMsg` */
function isMessageDiscriminant(node: t.Expression): boolean {
  const described = describeExpression(node);
  return (
    described.toLowerCase().endsWith('msg') ||
    described.split('.')[0].toLowerCase().endsWith('msg')
  );
}

/**
 * One handler per case label. Empty cases fall through to the next body and
 * share its mutations; cases that change nothing are dropped.
 */
function handlersFromCases(
  cases: t.SwitchCase[],
  filePath: string,
  vocabularies: Vocabularies
): MsgHandler[] {
  const handlers: MsgHandler[] = [];
  let pending: t.SwitchCase[] = [];

  for (const switchCase of cases) {
    pending.push(switchCase);
    if (switchCase.consequent.length === 0) continue;

    const mutations = collectModelMutations(switchCase.consequent, filePath, vocabularies);
    if (mutations.length > 0) {
      for (const labelled of pending) {
        handlers.push({
          msgPattern: casePattern(labelled.test),
          stateMutations: [...mutations],
          filePath,
          line: getLine(labelled),
        });
      }
    }
    pending = [];
  }

  return handlers;
}

function casePattern(test: t.SwitchCase['test']): string {
  if (!test) return 'default';
  const inner = unwrapExpression(test);
  if (t.isStringLiteral(inner)) return inner.value;
  if (t.isNumericLiteral(inner)) return String(inner.value);
  return describeExpression(inner);
}

/** Mutations of `model.*`, `state.*` or `this.*` in a case body */
function collectModelMutations(
  statements: t.Statement[],
  filePath: string,
  vocabularies: Vocabularies
): StateMutation[] {
  const mutations: StateMutation[] = [];

  const record = (path: { node: t.Node }) => {
    const site = classifyMutation(path.node, vocabularies);
    if (!site || !MODEL_PREFIXES.some((prefix) => site.target.startsWith(prefix))) return;
    mutations.push({ ...site, context: UPDATE_FUNCTION, filePath, line: getLine(path.node) });
  };

  for (const statement of statements) {
    traverse(statement, {
      noScope: true,
      AssignmentExpression: record,
      UpdateExpression: record,
      CallExpression: record,
      OptionalCallExpression: record,
    });
  }

  return mutations;
}
