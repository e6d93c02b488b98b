import * as t from '@babel/types';
import { collectMutations, isLikelyStateTarget, MutationContext } from '../src/mutation-collector';
import { parseSource } from '../src/parser';
import { DEFAULT_VOCABULARIES } from '../src/vocabularies';

const ctx: MutationContext = {
  filePath: 'test.ts',
  context: 'update',
  vocabularies: DEFAULT_VOCABULARIES,
};

function firstStatement(code: string): t.Statement {
  const [statement] = parseSource(code, 'test.ts').ast.program.body;
  return statement;
}

function consequentOf(code: string): t.Statement {
  const statement = firstStatement(code);
  if (!t.isIfStatement(statement)) throw new Error('Expected an if statement');
  return statement.consequent;
}

function summarize(code: string): Array<[string, string]> {
  return collectMutations(firstStatement(code), ctx).map((m) => [m.target, m.mutationType]);
}

describe('Mutation Collector', () => {
  describe('isLikelyStateTarget', () => {
    it('should accept dotted paths and state-like names', () => {
      expect(isLikelyStateTarget('state.counter')).toBe(true);
      expect(isLikelyStateTarget('self.value')).toBe(true);
      expect(isLikelyStateTarget('app_state')).toBe(true);
      expect(isLikelyStateTarget('mystate')).toBe(true);
      expect(isLikelyStateTarget('stateCount')).toBe(true);
      expect(isLikelyStateTarget('*counter')).toBe(true);
      expect(isLikelyStateTarget('<expr>.value')).toBe(true);
    });

    it('should reject plain locals', () => {
      expect(isLikelyStateTarget('count')).toBe(false);
      expect(isLikelyStateTarget('total')).toBe(false);
      expect(isLikelyStateTarget('<expr>')).toBe(false);
    });

    it('should match "state" case-sensitively', () => {
      expect(isLikelyStateTarget('appState')).toBe(false);
      expect(isLikelyStateTarget('STATE')).toBe(false);
    });
  });

  describe('collectMutations', () => {
    it('should classify assignments by operator', () => {
      expect(
        summarize(`{
  state.a = 1;
  state.b += 2;
  state.c -= 3;
  state.d *= 4;
  state.e /= 5;
  state.f %= 6;
}`)
      ).toEqual([
        ['state.a', 'assign'],
        ['state.b', 'add_assign'],
        ['state.c', 'sub_assign'],
        ['state.d', 'mul_assign'],
        ['state.e', 'div_assign'],
      ]);
    });

    it('should map increments and decrements onto compound tags', () => {
      expect(summarize('{ state.count++; --state.lives; }')).toEqual([
        ['state.count', 'add_assign'],
        ['state.lives', 'sub_assign'],
      ]);
    });

    it('should record mutating method calls on their receiver', () => {
      expect(
        summarize("{ state.items.push(1); state.tags.delete('x'); state.items.map((x) => x); }")
      ).toEqual([
        ['state.items', 'method:push'],
        ['state.tags', 'method:delete'],
      ]);
    });

    it('should not treat add() as a mutation', () => {
      expect(summarize('{ this.ui.add(this.panel); state.tags.add(tag); }')).toEqual([]);
    });

    it('should record optional method calls', () => {
      expect(summarize('{ state.queue?.shift(); }')).toEqual([['state.queue', 'method:shift']]);
    });

    it('should drop targets that do not look like state', () => {
      expect(summarize('{ local = 1; total += 2; items.push(3); stateCount = 4; }')).toEqual([
        ['stateCount', 'assign'],
      ]);
    });

    it('should render indexed targets with [..]', () => {
      expect(summarize("{ state.items[0] = 'x'; }")).toEqual([['state.items[..]', 'assign']]);
    });

    it('should visit the target before the value it is assigned', () => {
      expect(summarize('{ state.last = state.items.pop(); }')).toEqual([
        ['state.last', 'assign'],
        ['state.items', 'method:pop'],
      ]);
    });

    it('should skip nested conditionals entirely', () => {
      expect(
        summarize(`{
  state.a = 1;
  if (ui.button('Inner').clicked()) {
    state.b = 2;
  }
  state.c = 3;
}`)
      ).toEqual([
        ['state.a', 'assign'],
        ['state.c', 'assign'],
      ]);
    });

    it('should look inside callbacks in the body', () => {
      expect(summarize('{ list.forEach((x) => { state.seen.push(x); }); }')).toEqual([
        ['state.seen', 'method:push'],
      ]);
    });

    it('should handle a single-statement body', () => {
      expect(collectMutations(consequentOf('if (x) state.a = 1;'), ctx)).toEqual([
        { target: 'state.a', mutationType: 'assign', context: 'update', filePath: 'test.ts', line: 1 },
      ]);
    });

    it('should return nothing when the body is a conditional', () => {
      expect(collectMutations(consequentOf('if (x) if (y) state.a = 1;'), ctx)).toEqual([]);
    });

    it('should stamp each mutation with its own line', () => {
      const mutations = collectMutations(
        firstStatement(`{
  state.first = 1;

  state.second.push(2);
}`),
        ctx
      );

      expect(mutations.map((m) => m.line)).toEqual([2, 4]);
    });
  });
});
