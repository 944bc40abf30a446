import { describe, expect, it } from 'vitest';

import {
  evaluateCondition,
  evaluateExpression,
  substituteVariables,
} from '../../src/script/expression.js';
import {
  createVariableStore,
  integer,
  position,
  setVariable,
} from '../../src/script/variables.js';

describe('substituteVariables', () => {
  it('substitutes integer values exactly', () => {
    const store = createVariableStore();
    setVariable(store, 'x', integer(17));

    expect(substituteVariables('$x > 3', store)).toBe('17 > 3');
  });

  it('substitutes positions as pairs', () => {
    const store = createVariableStore();
    setVariable(store, 'pos', position(40, 30));

    expect(substituteVariables('$pos == (40, 30)', store)).toBe(
      '(40, 30) == (40, 30)'
    );
  });

  it('prefers the longest matching name', () => {
    const store = createVariableStore();
    setVariable(store, 'n', integer(1));
    setVariable(store, 'num', integer(200));

    expect(substituteVariables('$num + $n', store)).toBe('200 + 1');
  });

  it('replaces bare $ with the last status', () => {
    const store = createVariableStore();
    setVariable(store, 'n', integer(4));
    store.lastStatus = 1;

    expect(substituteVariables('$ == 0 and $n > 2', store)).toBe(
      '1 == 0 and 4 > 2'
    );
  });

  it('does not rescan substituted text', () => {
    const store = createVariableStore();
    setVariable(store, 'a', integer(-1));

    expect(substituteVariables('$a', store)).toBe('-1');
  });
});

describe('evaluateExpression', () => {
  it('compares integers', () => {
    expect(evaluateExpression('5 > 3')).toBe(true);
    expect(evaluateExpression('5 <= 3')).toBe(false);
    expect(evaluateExpression('3 == 3')).toBe(true);
    expect(evaluateExpression('3 != 3')).toBe(false);
  });

  it('respects arithmetic precedence', () => {
    expect(evaluateExpression('2 + 3 * 4 == 14')).toBe(true);
    expect(evaluateExpression('(2 + 3) * 4 == 20')).toBe(true);
  });

  it('uses floor division and divisor-signed modulo', () => {
    expect(evaluateExpression('7 / 2 == 3')).toBe(true);
    expect(evaluateExpression('-7 // 2 == -4')).toBe(true);
    expect(evaluateExpression('-7 % 3 == 2')).toBe(true);
  });

  it('supports word and symbol boolean operators', () => {
    expect(evaluateExpression('1 < 2 and 2 < 3')).toBe(true);
    expect(evaluateExpression('1 > 2 || 2 < 3')).toBe(true);
    expect(evaluateExpression('not 1 == 1')).toBe(false);
    expect(evaluateExpression('!0')).toBe(true);
    expect(evaluateExpression('true && False')).toBe(false);
  });

  it('chains comparisons', () => {
    expect(evaluateExpression('1 < 2 < 3')).toBe(true);
    expect(evaluateExpression('1 < 3 < 2')).toBe(false);
  });

  it('treats a bare integer as its truth value', () => {
    expect(evaluateExpression('0')).toBe(false);
    expect(evaluateExpression('-2')).toBe(true);
  });

  it('compares pairs for equality', () => {
    expect(evaluateExpression('(1, 2) == (1, 2)')).toBe(true);
    expect(evaluateExpression('(1, 2) != (2, 1)')).toBe(true);
    expect(evaluateExpression('(1, 2) == 1')).toBe(false);
  });

  it('rejects ordering on pairs', () => {
    expect(() => evaluateExpression('(1, 2) < (3, 4)')).toThrow(
      "Operator '<' is not defined for positions"
    );
  });

  it('rejects division by zero', () => {
    expect(() => evaluateExpression('1 / 0')).toThrow('Division by zero');
  });

  it('rejects unknown names', () => {
    expect(() => evaluateExpression('x > 1')).toThrow(
      "Unknown name 'x' at position 0"
    );
  });

  it('rejects stray characters', () => {
    expect(() => evaluateExpression('1 = 1')).toThrow(
      "Unexpected character '=' at position 2"
    );
  });

  it('rejects trailing tokens', () => {
    expect(() => evaluateExpression('1 2')).toThrow(
      "Unexpected '2' at position 2"
    );
  });

  it('rejects unbalanced parentheses', () => {
    expect(() => evaluateExpression('(1 + 2')).toThrow(
      'Unexpected end of expression'
    );
  });
});

describe('evaluateCondition', () => {
  it('evaluates with substituted variables', () => {
    const store = createVariableStore();
    setVariable(store, 'n', integer(5));

    expect(evaluateCondition('$n > 3', store)).toEqual({
      value: true,
      expression: '5 > 3',
      error: null,
    });
  });

  it('reads the last status through bare $', () => {
    const store = createVariableStore();

    expect(evaluateCondition('$ == 0', store).value).toBe(true);

    store.lastStatus = 1;
    expect(evaluateCondition('$ == 0', store).value).toBe(false);
  });

  it('compares a stored position with a literal', () => {
    const store = createVariableStore();
    setVariable(store, 'p', position(40, 30));

    expect(evaluateCondition('$p == (40, 30)', store).value).toBe(true);
  });

  it('returns false with the error instead of throwing', () => {
    const store = createVariableStore();

    expect(evaluateCondition('$missing > 1', store)).toEqual({
      value: false,
      expression: '0missing > 1',
      error: "Unexpected 'missing' at position 1",
    });
  });
});
