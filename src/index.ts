/**
 * UI Flow Extractor
 *
 * Static analysis of immediate-mode UI code: recovers which UI element, on
 * which action, mutates which state.
 *
 * @example
 * ```typescript
 * import { analyzeSource } from 'ui-flow-extractor';
 *
 * const { flows } = analyzeSource(
 *   'app.ts',
 *   `function show(ui, state) {
 *      if (ui.button('Click').clicked()) { state.counter += 1; }
 *    }`
 * );
 *
 * // flows[0].uiElement.label === 'Click'
 * // flows[0].stateMutations[0].target === 'state.counter'
 * ```
 */

// Core extraction
export { extractFlows } from './flow-extractor';
export { describeExpression, UNKNOWN_EXPRESSION } from './expression-describer';
export {
  resolveUiElement,
  resolveConstruction,
  extractFirstStringArgument,
  ResolveContext,
  RESPONSE_VAR_ELEMENT,
  UNKNOWN_ELEMENT,
} from './ui-element-resolver';
export { collectTriggers } from './trigger-collector';
export {
  collectMutations,
  classifyMutation,
  isLikelyStateTarget,
  MutationContext,
  MutationSite,
} from './mutation-collector';
export {
  extractUiElements,
  extractActions,
  extractStateMutations,
  isUiReceiver,
} from './inventory-extractor';
export { extractMsgEmissions, extractMsgHandlers, buildTeaFlows } from './tea-extractor';
export { ScopeStack } from './scope-stack';
export {
  DEFAULT_VOCABULARIES,
  UI_METHODS,
  ACTION_METHODS,
  MUTATING_METHODS,
  COMPOUND_ASSIGN_OPERATORS,
  DISPLAY_METHODS,
  STATUS_METHODS,
  DS_COMPONENTS,
  DS_ACTIONS,
  createVocabularies,
  VocabularyExtensions,
} from './vocabularies';

// File and project analysis
export { parseSource, parseFile, ParsedFile } from './parser';
export { analyzeSource, analyzeFile } from './analyzer';
export {
  detectUiFlows,
  DetectionResults,
  DetectorOptions,
  DEFAULT_PATTERN,
  DEFAULT_IGNORE,
} from './detector';

// Configuration
export {
  loadConfig,
  loadConfigWithInfo,
  mergeConfig,
  toVocabularies,
  DEFAULT_CONFIG,
  UiFlowConfig,
  LoadConfigResult,
} from './config';

// Output
export { generateFlowMermaid, generateMermaid, generateSummaryMermaid } from './graph-generator';

// Shared types
export {
  UiElement,
  Action,
  StateMutation,
  MutationType,
  UiFlow,
  Trigger,
  BindingTable,
  Vocabularies,
  ExtractOptions,
  FileAnalysis,
  Inventory,
  MsgEmission,
  MsgHandler,
  TeaFlow,
} from './types';
