import { Value } from './Value';

export class ValueArithmetic {
  static add(a: Value, b: Value): Value {
    return Value.make(
      a.data + b.data,
      '+',
      [a, b],
      (out) => () => {
        a.grad += out.grad;
        b.grad += out.grad;
      },
      `(${a.label}+${b.label})`
    );
  }

  static mul(a: Value, b: Value): Value {
    return Value.make(
      a.data * b.data,
      '*',
      [a, b],
      (out) => () => {
        a.grad += b.data * out.grad;
        b.grad += a.data * out.grad;
      },
      `(${a.label}*${b.label})`
    );
  }

  // a + b * -1: no derivative rule of its own, grads flow through the expansion.
  static sub(a: Value, b: Value): Value {
    const negated = ValueArithmetic.mul(b, new Value(-1));
    return ValueArithmetic.add(a, negated);
  }

  // The exponent is treated as a constant: it never receives a gradient.
  static pow(base: Value, exponent: Value): Value {
    return Value.make(
      Math.pow(base.data, exponent.data),
      'pow',
      [base, exponent],
      (out) => () => {
        base.grad += exponent.data * Math.pow(base.data, exponent.data - 1) * out.grad;
      },
      `(${base.label}^${exponent.label})`
    );
  }

  static square(a: Value): Value {
    return ValueArithmetic.pow(a, new Value(2));
  }

  static sum(vals: Value[]): Value {
    if (vals.length === 0) {
      throw new Error('sum expects at least one Value');
    }
    return vals.slice(1).reduce((acc, v) => ValueArithmetic.add(acc, v), vals[0]);
  }
}
