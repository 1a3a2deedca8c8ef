import { describe, it, expect } from 'vitest';
import { V } from '../src/V';
import { lineCollector } from './testUtils';

describe('V facade', () => {
  it('builds the same graph as the Value methods', () => {
    const x = V.C(4);
    const y = V.square(x);
    V.backward(y);
    expect(V.value(y)).toBe(16);
    expect(V.gradient(x)).toBe(8);
  });

  it('accepts plain numbers as operands', () => {
    expect(V.add(2, 3).data).toBe(5);
    expect(V.sub(5, 3).data).toBe(2);
    expect(V.mul(2, 3).data).toBe(6);
    expect(V.pow(2, 3).data).toBe(8);
    expect(V.relu(-1).data).toBe(0);
  });

  it('sum folds left to right and rejects empty input', () => {
    const a = V.W(1, 'a');
    const b = V.W(2, 'b');
    const c = V.W(3, 'c');
    const s = V.sum([a, b, c]);
    expect(s.data).toBe(6);
    expect(s.label).toBe('((a+b)+c)');
    V.backward(s);
    expect([a.grad, b.grad, c.grad]).toEqual([1, 1, 1]);
    expect(() => V.sum([])).toThrow('sum expects at least one Value');
  });

  it('update performs one gradient step', () => {
    const w = V.W(1, 'w');
    const loss = V.mul(w, 10);
    V.backward(loss);
    V.update(w, 0.01);
    expect(w.data).toBe(0.9);
  });

  it('dump forwards to the given sink', () => {
    const c = V.constant(2, 'c');
    const { lines, sink } = lineCollector();
    V.dump(c, sink);
    expect(lines).toEqual(['c: data = 2, gradient = 0']);
  });
});
