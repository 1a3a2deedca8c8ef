import type { LogSink } from './log';
import { Value } from './Value';
import { ValueActivation } from './ValueActivation';
import { ValueArithmetic } from './ValueArithmetic';

type Operand = Value | number;

function toValue(x: Operand): Value {
  return typeof x === 'number' ? new Value(x) : x;
}

/**
 * Free-function surface over {@link Value}, for code that reads better as
 * `V.add(a, b)` than as `a.add(b)`.
 * @public
 */
export class V {
  /** Constant leaf. */
  static C(x: number, label = ''): Value {
    return new Value(x, label);
  }

  static constant(x: number, label = ''): Value {
    return new Value(x, label);
  }

  /**
   * Trainable leaf. Identical to a constant as far as the engine is concerned;
   * the label is what tells parameters apart in dumps.
   */
  static W(x: number, label = ''): Value {
    return new Value(x, label);
  }

  static add(a: Operand, b: Operand): Value {
    return ValueArithmetic.add(toValue(a), toValue(b));
  }

  static sub(a: Operand, b: Operand): Value {
    return ValueArithmetic.sub(toValue(a), toValue(b));
  }

  static mul(a: Operand, b: Operand): Value {
    return ValueArithmetic.mul(toValue(a), toValue(b));
  }

  static pow(base: Operand, exponent: Operand): Value {
    return ValueArithmetic.pow(toValue(base), toValue(exponent));
  }

  static square(a: Operand): Value {
    return ValueArithmetic.square(toValue(a));
  }

  static relu(a: Operand): Value {
    return ValueActivation.relu(toValue(a));
  }

  /** Left fold with add; throws on an empty list. */
  static sum(vals: Value[]): Value {
    return ValueArithmetic.sum(vals);
  }

  static value(v: Value): number {
    return v.data;
  }

  static gradient(v: Value): number {
    return v.grad;
  }

  static backward(root: Value): void {
    root.backward();
  }

  static update(v: Value, learningRate: number): void {
    v.learn(learningRate);
  }

  static dump(v: Value, sink?: LogSink): void {
    v.dump(sink);
  }
}
