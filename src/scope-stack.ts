/**
 * Scope Stack
 *
 * Tracks the named function a traversal is currently inside. Each extractor
 * reports that name as the `context` of what it records.
 *
 * Frames are opened by function declarations, class and object methods,
 * class property initialisers, and function-valued `const`s at module level.
 * Callbacks and function-valued locals stay in the frame around them, so
 * they keep its context and see its bindings.
 */

import { NodePath, Visitor } from '@babel/traverse';
import * as t from '@babel/types';
import { describeExpression } from './expression-describer';

interface ScopeFrame<T> {
  /** Function that opened the frame; null for the module frame */
  owner: t.Function | null;
  name: string | null;
  data: T;
}

export class ScopeStack<T> {
  private readonly frames: ScopeFrame<T>[];

  constructor(private readonly createData: () => T) {
    this.frames = [{ owner: null, name: null, data: createData() }];
  }

  private get top(): ScopeFrame<T> {
    return this.frames[this.frames.length - 1];
  }

  /** Enclosing function name, '' at module level */
  get context(): string {
    return this.top.name ?? '';
  }

  /** Per-frame data of the innermost frame */
  get data(): T {
    return this.top.data;
  }

  enter(path: NodePath<t.Function>): void {
    const name = getScopeName(path, this.frames.length === 1);
    if (name === null) return;

    this.frames.push({ owner: path.node, name, data: this.createData() });
  }

  exit(node: t.Function): void {
    if (this.frames.length > 1 && this.top.owner === node) {
      this.frames.pop();
    }
  }

  /** `Function` enter/exit visitors keeping the stack in step with a traversal */
  visitor(): Visitor {
    return {
      Function: {
        enter: (path: NodePath<t.Function>) => this.enter(path),
        exit: (path: NodePath<t.Function>) => this.exit(path.node),
      },
    };
  }
}

/**
 * Name of a function that opens its own scope, or null for one that keeps
 * the enclosing scope.
 */
export function getScopeName(path: NodePath<t.Function>, atModuleLevel: boolean): string | null {
  const node = path.node;

  if (t.isFunctionDeclaration(node)) {
    return node.id ? node.id.name : 'default';
  }

  if (t.isClassMethod(node) || t.isObjectMethod(node)) {
    return getKeyName(node.key, node.computed);
  }

  if (t.isClassPrivateMethod(node)) {
    return `#${node.key.id.name}`;
  }

  // const show = (ui) => { ... }
  const parent = path.parent;
  if (t.isVariableDeclarator(parent) && parent.init === node && t.isIdentifier(parent.id)) {
    return atModuleLevel ? parent.id.name : null;
  }

  // class App { show = (ui) => { ... } }
  if (
    (t.isClassProperty(parent) || t.isClassPrivateProperty(parent)) &&
    parent.value === node
  ) {
    return getKeyName(parent.key, t.isClassProperty(parent) && parent.computed);
  }

  return null;
}

function getKeyName(key: t.Node, computed: boolean | undefined): string {
  if (computed) return describeExpression(key);
  if (t.isIdentifier(key)) return key.name;
  if (t.isPrivateName(key)) return `#${key.id.name}`;
  if (t.isStringLiteral(key)) return key.value;
  if (t.isNumericLiteral(key)) return String(key.value);
  return describeExpression(key);
}
