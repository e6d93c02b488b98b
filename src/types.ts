/**
 * Shared Types for UI Flow Extractor
 *
 * This module contains the record types produced by the extractor and the
 * option/result shapes shared across the analyzer modules.
 */

/**
 * Mutation tags.
 * - assign: `target = value`
 * - add_assign / sub_assign / mul_assign / div_assign: compound assignment
 * - method:<name>: call to a mutating method on the target
 */
export type MutationType =
  | 'assign'
  | 'add_assign'
  | 'sub_assign'
  | 'mul_assign'
  | 'div_assign'
  | `method:${string}`;

/** A UI element found in the code (button, checkbox, slider, ...) */
export interface UiElement {
  /** Constructor method name, or 'response_var' / 'unknown' for unresolved references */
  elementType: string;
  /** First string-literal argument of the constructing call, if any */
  label?: string;
  /** Enclosing function name ('' at module level) */
  context: string;
  filePath: string;
  /** 1-based line, 0 if the tree has no positions */
  line: number;
  /** Local variable through which the element was referenced */
  responseVar?: string;
}

/** An action query on a UI element (clicked, changed, hovered, ...) */
export interface Action {
  actionType: string;
  /** Canonical path of the queried receiver, e.g. `ui.button()` or `response` */
  source: string;
  context: string;
  filePath: string;
  line: number;
}

export interface StateMutation {
  /** Canonical path of the mutated location, e.g. `state.items` */
  target: string;
  mutationType: MutationType;
  context: string;
  filePath: string;
  line: number;
}

/**
 * A complete UI flow: UI element -> action -> state mutations.
 * `stateMutations` is never empty.
 */
export interface UiFlow {
  uiElement: UiElement;
  action: Action;
  stateMutations: StateMutation[];
  context: string;
}

/** A (UI element, action) pair extracted from a conditional's test */
export type Trigger = [UiElement, Action];

/**
 * Local variable name -> UI element it aliases.
 * Lives for one function body.
 */
export type BindingTable = Map<string, UiElement>;

/** The closed name sets the extractor recognizes */
export interface Vocabularies {
  uiMethods: ReadonlySet<string>;
  actionMethods: ReadonlySet<string>;
  mutatingMethods: ReadonlySet<string>;
  /** Assignment/update operator -> mutation tag */
  compoundAssignOperators: ReadonlyMap<string, MutationType>;
  /** Widgets listed in the inventory only */
  displayMethods: ReadonlySet<string>;
  /** Extra response queries for the action inventory */
  statusMethods: ReadonlySet<string>;
  dsComponents: ReadonlySet<string>;
  dsActions: ReadonlySet<string>;
}

export interface ExtractOptions {
  /** Vocabularies to recognize (defaults to DEFAULT_VOCABULARIES) */
  vocabularies?: Vocabularies;
}

/**
 * A design-system component that emits a message,
 * e.g. `Button.primary('+').onClick(ctx, Msg.Increment)`
 */
export interface MsgEmission {
  /** Component name (Button, Input, ...) */
  component: string;
  /** Factory method (primary, secondary, ...), or 'new' for `new Button(...)` */
  variant: string;
  label?: string;
  /** Handler method (onClick, onChange, ...) */
  action: string;
  /** Emitted message, e.g. `Msg.Increment` */
  msg: string;
  context: string;
  filePath: string;
  line: number;
}

/** A `case` of the `switch (msg)` in an `update` function */
export interface MsgHandler {
  msgPattern: string;
  stateMutations: StateMutation[];
  filePath: string;
  line: number;
}

/** Component -> message -> state changes; `handler` is null when no case matches */
export interface TeaFlow {
  emission: MsgEmission;
  handler: MsgHandler | null;
}

/** Element, action and mutation inventories, independent of causality */
export interface Inventory {
  uiElements: UiElement[];
  actions: Action[];
  stateMutations: StateMutation[];
}

/** Analysis result for a single file */
export interface FileAnalysis extends Inventory {
  path: string;
  /** Scope-aware UI -> action -> state chains */
  flows: UiFlow[];
  msgEmissions: MsgEmission[];
  msgHandlers: MsgHandler[];
  teaFlows: TeaFlow[];
}
