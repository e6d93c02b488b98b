/**
 * Flow Extractor
 *
 * Scope-aware walk that reconstructs UI causality:
 *
 *   if (ui.button('x').clicked()) { state.y = z; }
 *   -> UiFlow { uiElement: button('x'), action: clicked, stateMutations: [state.y = z] }
 *
 * Response bindings are tracked per function:
 *
 *   const r = ui.button('x');
 *   if (r.clicked()) { ... }      // r resolves back to button('x')
 */

import traverse, { NodePath } from '@babel/traverse';
import * as t from '@babel/types';
import { BindingTable, ExtractOptions, UiFlow, Vocabularies } from './types';
import { DEFAULT_VOCABULARIES } from './vocabularies';
import { ResolveContext, resolveConstruction } from './ui-element-resolver';
import { collectTriggers } from './trigger-collector';
import { collectMutations } from './mutation-collector';
import { ScopeStack } from './scope-stack';

/**
 * Extract UI flows from a parsed file. The tree is only read; `filePath` is
 * stamped onto every record.
 */
export function extractFlows(
  filePath: string,
  ast: t.File | t.Program,
  options: ExtractOptions = {}
): UiFlow[] {
  const walker = new FlowWalker(filePath, options.vocabularies ?? DEFAULT_VOCABULARIES);

  traverse(ast, {
    ...walker.scopes.visitor(),
    noScope: true,

    VariableDeclarator(path: NodePath<t.VariableDeclarator>) {
      walker.captureBinding(path.node);
    },

    IfStatement(path: NodePath<t.IfStatement>) {
      // Nested conditionals in the test/consequent/alternate are reached by
      // the traversal afterwards and scanned on their own
      walker.scanConditional(path.node);
    },
  });

  return walker.flows;
}

class FlowWalker {
  readonly flows: UiFlow[] = [];
  /** Named functions get a fresh binding table; closures share the enclosing one */
  readonly scopes = new ScopeStack<BindingTable>(() => new Map());

  constructor(
    private readonly filePath: string,
    private readonly vocabularies: Vocabularies
  ) {}

  private resolveContext(): ResolveContext {
    return {
      filePath: this.filePath,
      context: this.scopes.context,
      bindings: this.scopes.data,
      vocabularies: this.vocabularies,
    };
  }

  /** `const r = ui.button('x')` -> r aliases button('x') for the rest of the function */
  captureBinding(declarator: t.VariableDeclarator): void {
    if (!declarator.init || !t.isIdentifier(declarator.id)) return;

    const element = resolveConstruction(declarator.init, this.resolveContext());
    if (element) {
      this.scopes.data.set(declarator.id.name, element);
    }
  }

  scanConditional(node: t.IfStatement): void {
    const ctx = this.resolveContext();
    const triggers = collectTriggers(node.test, ctx);
    const mutations = collectMutations(node.consequent, ctx);

    if (mutations.length === 0) return;

    for (const [uiElement, action] of triggers) {
      this.flows.push({
        uiElement,
        action,
        stateMutations: [...mutations],
        context: ctx.context,
      });
    }
  }
}
