import { Value } from './Value';

export class ValueActivation {
  // Subgradient at exactly 0 is 0.
  static relu(x: Value): Value {
    return Value.make(
      Math.max(0, x.data),
      'relu',
      [x],
      (out) => () => {
        if (x.data > 0) x.grad += out.grad;
      },
      `relu(${x.label})`
    );
  }
}
