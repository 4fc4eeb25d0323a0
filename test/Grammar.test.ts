import { describe, it, expect } from 'vitest';
import { Grammar, Terminal, Sequence, Choice } from '../src/index.js';

describe('Grammar', () => {
  it('creates an empty grammar', () => {
    const g = new Grammar();
    expect(g.size).toBe(0);
    expect(g.names()).toEqual([]);
  });

  it('seeds rules from options', () => {
    const digit = new Terminal('1');
    const g = new Grammar({ rules: { Digit: digit } });
    expect(g.get('Digit')).toBe(digit);
    expect(g.size).toBe(1);
  });
});

describe('Grammar.put / Grammar.get', () => {
  it('stores and retrieves rules by name', () => {
    const g = new Grammar();
    const plus = new Terminal('+');
    expect(g.put('Plus', plus)).toBeUndefined();
    expect(g.get('Plus')).toBe(plus);
    expect(g.has('Plus')).toBe(true);
  });

  it('returns undefined for unknown names', () => {
    const g = new Grammar();
    expect(g.get('Missing')).toBeUndefined();
    expect(g.has('Missing')).toBe(false);
  });

  it('replaces on collision and returns the previous rule', () => {
    const g = new Grammar();
    const first = new Terminal('a');
    const second = new Terminal('b');
    g.put('Letter', first);
    expect(g.put('Letter', second)).toBe(first);
    expect(g.get('Letter')).toBe(second);
    expect(g.size).toBe(1);
  });

  it('lists registered names', () => {
    const g = new Grammar();
    g.put('A', new Terminal('a'));
    g.put('B', new Terminal('b'));
    expect(g.names().sort()).toEqual(['A', 'B']);
  });
});

describe('Grammar helpers', () => {
  it('registers a named terminal', () => {
    const g = new Grammar();
    const t = g.terminal('Two', '2');
    expect(t).toBeInstanceOf(Terminal);
    expect(t.value).toBe(50);
    expect(t.name).toBe('Two');
    expect(g.get('Two')).toBe(t);
  });

  it('registers a named sequence', () => {
    const g = new Grammar();
    const s = g.sequence('Pair', ['Two', '+', 'Two']);
    expect(s).toBeInstanceOf(Sequence);
    expect(s.elements).toEqual(['Two', '+', 'Two']);
    expect(s.name).toBe('Pair');
    expect(g.get('Pair')).toBe(s);
  });

  it('registers a named choice, optionally passthrough', () => {
    const g = new Grammar();
    const plain = g.choice('Atom', ['Two', 'Three']);
    const through = g.choice('Operand', ['Atom'], { passthrough: true });
    expect(plain).toBeInstanceOf(Choice);
    expect(plain.isPassthrough).toBe(false);
    expect(through.isPassthrough).toBe(true);
    expect(g.get('Operand')).toBe(through);
  });

  it('allows names to be referenced before they are registered', () => {
    const g = new Grammar();
    const expr = g.sequence('Expr', ['Term', 'Rest']);
    expect(g.has('Term')).toBe(false);
    g.terminal('Term', 't');
    expect(g.has('Term')).toBe(true);
    expect(expr.elements).toEqual(['Term', 'Rest']);
  });
});
