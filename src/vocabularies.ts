import { MutationType, Vocabularies } from './types';

/** Methods whose call constructs a UI element */
export const UI_METHODS: readonly string[] = [
  'button',
  'smallButton',
  'label',
  'heading',
  'checkbox',
  'radio',
  'radioValue',
  'selectableLabel',
  'selectableValue',
  'textEditSingleline',
  'textEditMultiline',
  'slider',
  'dragValue',
  'toggleValue',
  'menuButton',
  'collapsing',
  'add',
];

/** Methods that query whether an action happened on an element */
export const ACTION_METHODS: readonly string[] = [
  'clicked',
  'clickedBy',
  'secondaryClicked',
  'middleClicked',
  'doubleClicked',
  'tripleClicked',
  'changed',
  'dragged',
  'dragStarted',
  'dragStopped',
  'hovered',
  'hasFocus',
  'gainedFocus',
  'lostFocus',
];

/**
 * Mostly display-only widgets. They are listed in the element inventory but
 * flow resolution does not treat them as constructors.
 */
export const DISPLAY_METHODS: readonly string[] = [
  'monospace',
  'code',
  'addSized',
  'colorEditButtonRgb',
  'colorEditButtonRgba',
  'image',
  'hyperlink',
  'hyperlinkTo',
  'separator',
  'spinner',
  'progressBar',
];

/** Response queries listed in the action inventory on top of ACTION_METHODS */
export const STATUS_METHODS: readonly string[] = [
  'highlighted',
  'enabled',
  'clickedElsewhere',
  'isPointerButtonDownOn',
];

/** Design-system components whose handlers emit messages: `Button.primary('+')` */
export const DS_COMPONENTS: readonly string[] = ['Button', 'Input', 'Card', 'Badge', 'Icon'];

/** Methods that attach a message to a component: `.onClick(ctx, Msg.Increment)` */
export const DS_ACTIONS: readonly string[] = ['onClick', 'onChange', 'showWith'];

export const MUTATING_METHODS: readonly string[] = [
  'push',
  'pop',
  'insert',
  'remove',
  'clear',
  'append',
  'extend',
  'retain',
  'drain',
  'truncate',
  'toggle',
  'set',
  'take',
  'replace',
  // Array/Map/Set mutators
  'shift',
  'unshift',
  'splice',
  'sort',
  'reverse',
  'fill',
  'delete',
];

/** `++`/`--` are update expressions and map onto the += / -= tags */
export const COMPOUND_ASSIGN_OPERATORS: ReadonlyArray<[string, MutationType]> = [
  ['+=', 'add_assign'],
  ['-=', 'sub_assign'],
  ['*=', 'mul_assign'],
  ['/=', 'div_assign'],
  ['++', 'add_assign'],
  ['--', 'sub_assign'],
];

export const DEFAULT_VOCABULARIES: Vocabularies = {
  uiMethods: new Set(UI_METHODS),
  actionMethods: new Set(ACTION_METHODS),
  mutatingMethods: new Set(MUTATING_METHODS),
  compoundAssignOperators: new Map(COMPOUND_ASSIGN_OPERATORS),
  displayMethods: new Set(DISPLAY_METHODS),
  statusMethods: new Set(STATUS_METHODS),
  dsComponents: new Set(DS_COMPONENTS),
  dsActions: new Set(DS_ACTIONS),
};

export interface VocabularyExtensions {
  uiMethods?: string[];
  actionMethods?: string[];
  mutatingMethods?: string[];
  dsComponents?: string[];
  dsActions?: string[];
}

/**
 * Build a vocabulary set with extra names unioned into the defaults.
 * The defaults are left untouched.
 */
export function createVocabularies(
  extensions: VocabularyExtensions = {},
  base: Vocabularies = DEFAULT_VOCABULARIES
): Vocabularies {
  return {
    uiMethods: new Set([...base.uiMethods, ...(extensions.uiMethods || [])]),
    actionMethods: new Set([...base.actionMethods, ...(extensions.actionMethods || [])]),
    mutatingMethods: new Set([...base.mutatingMethods, ...(extensions.mutatingMethods || [])]),
    compoundAssignOperators: new Map(base.compoundAssignOperators),
    displayMethods: new Set(base.displayMethods),
    statusMethods: new Set(base.statusMethods),
    dsComponents: new Set([...base.dsComponents, ...(extensions.dsComponents || [])]),
    dsActions: new Set([...base.dsActions, ...(extensions.dsActions || [])]),
  };
}
