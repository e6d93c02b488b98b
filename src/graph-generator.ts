/**
 * Mermaid flowchart output for extracted flows and inventories
 */

import { Inventory, UiFlow } from './types';

const UI_STYLE = 'fill:#e1f5fe';
const ACTION_STYLE = 'fill:#fff9c4';
const STATE_STYLE = 'fill:#c8e6c9';

/**
 * One UI -> action -> mutations chain per flow
 */
export function generateFlowMermaid(analysis: { flows: UiFlow[] }): string {
  if (analysis.flows.length === 0) {
    return 'flowchart TD\n    %% No flows detected';
  }

  const lines = ['flowchart TD', ''];

  analysis.flows.forEach((flow, i) => {
    const flowId = `F${i}`;
    const { uiElement, action } = flow;

    const uiNode = `${flowId}_UI`;
    const uiLabel = uiElement.label ?? uiElement.elementType;
    lines.push(`    ${uiNode}["${uiIcon(uiElement.elementType)} ${escapeMermaid(uiLabel)}"]`);
    lines.push(`    style ${uiNode} ${UI_STYLE}`);

    const actNode = `${flowId}_ACT`;
    lines.push(`    ${actNode}{"${escapeMermaid(action.actionType)}"}`);
    lines.push(`    style ${actNode} ${ACTION_STYLE}`);

    lines.push(`    ${uiNode} --> ${actNode}`);

    for (const mutation of flow.stateMutations) {
      const stateNode = `${flowId}_${sanitizeId(mutation.target)}`;
      lines.push(
        `    ${stateNode}(["${mutationIcon(mutation.mutationType)} ${escapeMermaid(mutation.target)}"])`
      );
      lines.push(`    style ${stateNode} ${STATE_STYLE}`);
      lines.push(`    ${actNode} --> ${stateNode}`);
    }

    lines.push('');
  });

  return lines.join('\n');
}

/**
 * Every inventoried element, action and mutation as a node. Nodes recorded
 * in the same function are connected UI -> action -> state.
 */
export function generateMermaid(inventory: Inventory): string {
  const lines = ['flowchart TD', '', '    %% UI Elements'];

  inventory.uiElements.forEach((element, i) => {
    const label = element.label ?? element.elementType;
    lines.push(`    UI${i}["${uiIcon(element.elementType)} ${escapeMermaid(label)}"]`);
    lines.push(`    style UI${i} ${UI_STYLE}`);
  });

  lines.push('', '    %% Actions');
  inventory.actions.forEach((action, i) => {
    lines.push(`    ACT${i}{"${escapeMermaid(action.actionType)}"}`);
    lines.push(`    style ACT${i} ${ACTION_STYLE}`);
  });

  lines.push('', '    %% State Mutations');
  inventory.stateMutations.forEach((mutation, i) => {
    lines.push(
      `    STATE${i}(["${mutationIcon(mutation.mutationType)} ${escapeMermaid(mutation.target)}"])`
    );
    lines.push(`    style STATE${i} ${STATE_STYLE}`);
  });

  lines.push('', '    %% Connections', ...connectByContext(inventory));

  return lines.join('\n');
}

interface ContextGroup {
  ui: number[];
  actions: number[];
  mutations: number[];
}

/** Edges between nodes sharing a (file, function) context, module level excluded */
function connectByContext(inventory: Inventory): string[] {
  const groups = new Map<string, ContextGroup>();
  const groupFor = (record: { filePath: string; context: string }): ContextGroup | null => {
    if (!record.context) return null;
    const key = `${record.filePath}\u0000${record.context}`;
    let group = groups.get(key);
    if (!group) {
      group = { ui: [], actions: [], mutations: [] };
      groups.set(key, group);
    }
    return group;
  };

  inventory.uiElements.forEach((element, i) => groupFor(element)?.ui.push(i));
  inventory.actions.forEach((action, i) => groupFor(action)?.actions.push(i));
  inventory.stateMutations.forEach((mutation, i) => groupFor(mutation)?.mutations.push(i));

  const edges: string[] = [];
  for (const group of groups.values()) {
    for (const ui of group.ui) {
      for (const act of group.actions) {
        edges.push(`    UI${ui} --> ACT${act}`);
      }
    }
    for (const act of group.actions) {
      for (const state of group.mutations) {
        edges.push(`    ACT${act} --> STATE${state}`);
      }
    }
  }
  return edges;
}

/**
 * Layered overview across files: element types, action types and state
 * roots from the inventories, with counts
 */
export function generateSummaryMermaid(files: Inventory[]): string {
  const uiTypes = countBy(
    files.flatMap((file) => file.uiElements.map((element) => element.elementType))
  );
  const actionTypes = countBy(
    files.flatMap((file) => file.actions.map((action) => action.actionType))
  );
  const stateRoots = countBy(
    files.flatMap((file) =>
      file.stateMutations.map((mutation) => mutation.target.split('.').slice(0, 2).join('.'))
    )
  );

  const lines = ['flowchart LR', '', '    subgraph UI["UI Layer"]'];
  for (const [uiType, count] of uiTypes) {
    lines.push(
      `        UI_${sanitizeId(uiType)}["${uiIcon(uiType)} ${escapeMermaid(uiType)} (${count})"]`
    );
  }
  lines.push('    end', '', '    subgraph Actions["Action Layer"]');
  for (const [actionType, count] of actionTypes) {
    lines.push(`        ACT_${sanitizeId(actionType)}{"${escapeMermaid(actionType)}() (${count})"}`);
  }
  lines.push('    end', '', '    subgraph State["State Layer"]');
  for (const [target, count] of stateRoots) {
    lines.push(`        STATE_${sanitizeId(target)}(["${escapeMermaid(target)} (${count})"])`);
  }
  lines.push('    end', '', '    %% Layer connections', '    UI --> Actions', '    Actions --> State');

  return lines.join('\n');
}

/** Counts in first-seen order */
function countBy(values: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return counts;
}

export function sanitizeId(value: string): string {
  return value.replace(/[^A-Za-z0-9]/g, '_');
}

export function escapeMermaid(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, "'");
}

function uiIcon(elementType: string): string {
  switch (elementType) {
    case 'button':
    case 'smallButton':
    case 'radio':
    case 'radioValue':
      return '🔘';
    case 'label':
    case 'heading':
    case 'monospace':
    case 'code':
      return '📝';
    case 'checkbox':
    case 'toggleValue':
      return '☑️';
    case 'textEditSingleline':
    case 'textEditMultiline':
      return '✏️';
    case 'slider':
    case 'dragValue':
      return '🎚️';
    case 'menuButton':
    case 'collapsing':
      return '📂';
    case 'colorEditButtonRgb':
    case 'colorEditButtonRgba':
      return '🎨';
    case 'image':
      return '🖼️';
    case 'hyperlink':
    case 'hyperlinkTo':
      return '🔗';
    case 'separator':
      return '➖';
    case 'spinner':
    case 'progressBar':
      return '⏳';
    default:
      return '📦';
  }
}

function mutationIcon(mutationType: string): string {
  if (mutationType.startsWith('method:')) {
    switch (mutationType.slice('method:'.length)) {
      case 'push':
      case 'insert':
      case 'append':
      case 'extend':
      case 'unshift':
        return '➕';
      case 'pop':
      case 'remove':
      case 'clear':
      case 'drain':
      case 'shift':
      case 'delete':
        return '➖';
      case 'toggle':
        return '🔄';
      default:
        return '📝';
    }
  }

  switch (mutationType) {
    case 'assign':
      return '=';
    case 'add_assign':
      return '+=';
    case 'sub_assign':
      return '-=';
    default:
      return '📝';
  }
}
