import {
  escapeMermaid,
  generateFlowMermaid,
  generateMermaid,
  generateSummaryMermaid,
  sanitizeId,
} from '../src/graph-generator';
import { Inventory, MutationType, UiFlow } from '../src/types';

function at(context: string, filePath = 'app.ts') {
  return { context, filePath, line: 1 };
}

function inventory(
  uiElements: Array<[string, string | undefined]>,
  actions: string[],
  mutations: Array<[string, MutationType]>,
  context = 'show'
): Inventory {
  return {
    uiElements: uiElements.map(([elementType, label]) => ({ elementType, label, ...at(context) })),
    actions: actions.map((actionType) => ({ actionType, source: 'ui', ...at(context) })),
    stateMutations: mutations.map(([target, mutationType]) => ({
      target,
      mutationType,
      ...at(context),
    })),
  };
}

function flow(
  elementType: string,
  label: string | undefined,
  actionType: string,
  mutations: Array<[string, MutationType]>
): UiFlow {
  const location = { context: 'show', filePath: 'app.ts', line: 1 };
  return {
    uiElement: { elementType, label, ...location },
    action: { actionType, source: 'ui', ...location },
    stateMutations: mutations.map(([target, mutationType]) => ({
      target,
      mutationType,
      ...location,
    })),
    context: 'show',
  };
}

describe('Graph Generator', () => {
  describe('generateFlowMermaid', () => {
    it('should render a placeholder when there are no flows', () => {
      expect(generateFlowMermaid({ flows: [] })).toBe('flowchart TD\n    %% No flows detected');
    });

    it('should render one chain per flow', () => {
      const output = generateFlowMermaid({
        flows: [flow('button', 'Click me', 'clicked', [['state.counter', 'add_assign']])],
      });

      expect(output.split('\n')).toEqual([
        'flowchart TD',
        '',
        '    F0_UI["🔘 Click me"]',
        '    style F0_UI fill:#e1f5fe',
        '    F0_ACT{"clicked"}',
        '    style F0_ACT fill:#fff9c4',
        '    F0_UI --> F0_ACT',
        '    F0_state_counter(["+= state.counter"])',
        '    style F0_state_counter fill:#c8e6c9',
        '    F0_ACT --> F0_state_counter',
        '',
      ]);
    });

    it('should number flows and fall back to the element type without a label', () => {
      const lines = generateFlowMermaid({
        flows: [
          flow('label', 'Hi', 'hovered', [['state.seen', 'assign']]),
          flow('dragValue', undefined, 'changed', [
            ['state.items', 'method:push'],
            ['state.items', 'method:pop'],
          ]),
        ],
      }).split('\n');

      expect(lines).toContain('    F0_UI["📝 Hi"]');
      expect(lines).toContain('    F0_state_seen(["= state.seen"])');
      expect(lines).toContain('    F1_ACT{"changed"}');
      expect(lines).toContain('    F1_state_items(["➕ state.items"])');
      expect(lines).toContain('    F1_state_items(["➖ state.items"])');
      expect(lines.filter((line) => line === '    F1_ACT --> F1_state_items')).toHaveLength(2);
    });

    it('should escape labels', () => {
      const output = generateFlowMermaid({
        flows: [flow('button', 'Say "hi" <now>', 'clicked', [['state.greeted', 'assign']])],
      });

      expect(output.split('\n')[2]).toBe(`    F0_UI["🔘 Say 'hi' &lt;now&gt;"]`);
    });
  });

  describe('generateMermaid', () => {
    it('should render every inventoried record and connect them within a function', () => {
      const output = generateMermaid(
        inventory([['button', 'Save'], ['label', undefined]], ['clicked'], [['state.saved', 'assign']])
      );

      expect(output.split('\n')).toEqual([
        'flowchart TD',
        '',
        '    %% UI Elements',
        '    UI0["🔘 Save"]',
        '    style UI0 fill:#e1f5fe',
        '    UI1["📝 label"]',
        '    style UI1 fill:#e1f5fe',
        '',
        '    %% Actions',
        '    ACT0{"clicked"}',
        '    style ACT0 fill:#fff9c4',
        '',
        '    %% State Mutations',
        '    STATE0(["= state.saved"])',
        '    style STATE0 fill:#c8e6c9',
        '',
        '    %% Connections',
        '    UI0 --> ACT0',
        '    UI1 --> ACT0',
        '    ACT0 --> STATE0',
      ]);
    });

    it('should only connect records from the same file and function', () => {
      const output = generateMermaid({
        uiElements: [
          { elementType: 'button', label: 'A', ...at('a') },
          { elementType: 'button', label: 'B', ...at('b') },
          { elementType: 'button', label: 'C', ...at('a', 'other.ts') },
        ],
        actions: [
          { actionType: 'clicked', source: 'r', ...at('b') },
          { actionType: 'clicked', source: 'r', ...at('a') },
        ],
        stateMutations: [
          { target: 'state.x', mutationType: 'assign', ...at('a') },
          { target: 'state.y', mutationType: 'assign', ...at('') },
        ],
      });

      const lines = output.split('\n');
      expect(lines.slice(lines.indexOf('    %% Connections') + 1)).toEqual([
        '    UI0 --> ACT1',
        '    ACT1 --> STATE0',
        '    UI1 --> ACT0',
      ]);
    });

    it('should render only the section headers for an empty inventory', () => {
      expect(generateMermaid({ uiElements: [], actions: [], stateMutations: [] }).split('\n')).toEqual([
        'flowchart TD',
        '',
        '    %% UI Elements',
        '',
        '    %% Actions',
        '',
        '    %% State Mutations',
        '',
        '    %% Connections',
      ]);
    });

    it('should use display widget icons', () => {
      const lines = generateMermaid(inventory([['spinner', undefined], ['hyperlink', 'Docs']], [], [])).split(
        '\n'
      );

      expect(lines).toContain('    UI0["⏳ spinner"]');
      expect(lines).toContain('    UI1["🔗 Docs"]');
    });
  });

  describe('generateSummaryMermaid', () => {
    it('should count inventories across files by layer in first-seen order', () => {
      const output = generateSummaryMermaid([
        inventory(
          [['button', 'A'], ['label', 'B']],
          ['clicked', 'hovered'],
          [
            ['state.counter', 'add_assign'],
            ['state.settings.dirty', 'assign'],
          ]
        ),
        inventory(
          [['button', 'C']],
          ['clicked'],
          [
            ['state.counter', 'assign'],
            ['state.settings.theme', 'assign'],
          ]
        ),
      ]);

      expect(output.split('\n')).toEqual([
        'flowchart LR',
        '',
        '    subgraph UI["UI Layer"]',
        '        UI_button["🔘 button (2)"]',
        '        UI_label["📝 label (1)"]',
        '    end',
        '',
        '    subgraph Actions["Action Layer"]',
        '        ACT_clicked{"clicked() (2)"}',
        '        ACT_hovered{"hovered() (1)"}',
        '    end',
        '',
        '    subgraph State["State Layer"]',
        '        STATE_state_counter(["state.counter (2)"])',
        '        STATE_state_settings(["state.settings (2)"])',
        '    end',
        '',
        '    %% Layer connections',
        '    UI --> Actions',
        '    Actions --> State',
      ]);
    });

    it('should count records that are not part of any flow', () => {
      const lines = generateSummaryMermaid([
        inventory([['heading', 'Title']], [], [['state.loaded', 'assign']], ''),
      ]).split('\n');

      expect(lines).toContain('        UI_heading["📝 heading (1)"]');
      expect(lines).toContain('        STATE_state_loaded(["state.loaded (1)"])');
    });
  });

  describe('helpers', () => {
    it('should replace every non-alphanumeric character in ids', () => {
      expect(sanitizeId('state.items[..]')).toBe('state_items____');
      expect(sanitizeId('this.#secret')).toBe('this__secret');
    });

    it('should escape Mermaid-sensitive characters', () => {
      expect(escapeMermaid('a "b" <c> & d')).toBe("a 'b' &lt;c&gt; &amp; d");
    });
  });
});
