/**
 * Function type for backward pass computations in automatic differentiation.
 * @public
 */
export type BackwardFn = () => void;

/**
 * Operation that produced a Value. `'none'` marks a leaf (constant or parameter).
 * @public
 */
export type Operation = 'none' | '+' | '*' | 'pow' | 'relu';

import { logger, type LogSink } from './log';
import { ValueActivation } from './ValueActivation';
import { ValueArithmetic } from './ValueArithmetic';

/**
 * Represents a scalar value in the computational graph for automatic differentiation.
 * Supports eager forward computation and reverse-mode autodiff (backpropagation).
 *
 * A Value may be used as an operand by any number of later Values; the graph is a
 * DAG and never a cycle, since every operation only consumes Values that already exist.
 * @public
 */
export class Value {
  /**
   * The numeric value stored in this node. Fixed at construction for derived
   * nodes; only {@link Value.learn} changes it afterwards, and derived nodes are
   * not recomputed when that happens.
   * @public
   */
  data: number;

  /**
   * Accumulated derivative of the last backward root with respect to this value.
   * Stays 0 until a backward pass reaches this node.
   * @public
   */
  grad: number = 0;

  /**
   * Optional label for debugging and visualization.
   * @public
   */
  public label: string;

  private backwardFn: BackwardFn = () => {};
  private _op: Operation = 'none';
  private _prev: readonly Value[] = [];

  /**
   * Creates a leaf. No validation: NaN and infinities are accepted as-is.
   */
  constructor(data: number, label = '') {
    this.data = data;
    this.label = label;
  }

  /**
   * Operation that produced this node.
   * @public
   */
  get op(): Operation {
    return this._op;
  }

  /**
   * Operands, in order: left/base first, right/exponent second. Empty for leaves.
   * @public
   */
  get prev(): readonly Value[] {
    return this._prev;
  }

  private static ensureValue(x: Value | number): Value {
    return typeof x === 'number' ? new Value(x) : x;
  }

  /**
   * Adds this and other.
   * @param other Value or number to add
   * @returns New Value with sum.
   */
  add(other: Value | number): Value {
    return ValueArithmetic.add(this, Value.ensureValue(other));
  }

  /**
   * Multiplies this and other.
   * @param other Value or number to multiply
   * @returns New Value with product.
   */
  mul(other: Value | number): Value {
    return ValueArithmetic.mul(this, Value.ensureValue(other));
  }

  /**
   * Subtracts other from this, as `this + other * -1`.
   * @param other Value or number to subtract
   * @returns New Value with difference.
   */
  sub(other: Value | number): Value {
    return ValueArithmetic.sub(this, Value.ensureValue(other));
  }

  /**
   * Raises this to the power of exponent. The exponent never receives a gradient.
   * A negative base with a fractional exponent gives NaN.
   * @param exponent Exponent Value or number
   * @returns New Value with pow(this, exponent)
   */
  pow(exponent: Value | number): Value {
    return ValueArithmetic.pow(this, Value.ensureValue(exponent));
  }

  /**
   * Returns the square of this Value, as `this ** 2`.
   * @returns New Value with squared data.
   */
  square(): Value {
    return ValueArithmetic.square(this);
  }

  /**
   * Returns relu(this).
   * @returns New Value with relu.
   */
  relu(): Value {
    return ValueActivation.relu(this);
  }

  /**
   * Performs a reverse-mode autodiff backward pass from this Value.
   *
   * Every reachable grad is reset to 0, this Value's grad is seeded to 1, and
   * each node pushes its contribution into its operands in reverse topological
   * order, so a shared node has collected every parent's contribution before it
   * passes anything further down.
   */
  backward(): void {
    const topo = Value.topologicalOrder(this);
    for (const v of topo) v.grad = 0;
    this.grad = 1;

    for (let i = topo.length - 1; i >= 0; i--) {
      topo[i].backwardFn();
    }
  }

  /**
   * Moves this value one gradient-descent step: `data -= grad * learningRate`.
   * Before any backward pass, grad is 0 and this does nothing.
   * @param learningRate Step size
   */
  learn(learningRate: number): void {
    this.data -= this.grad * learningRate;
  }

  /**
   * Writes this node and everything below it, one line per visit, indented by depth.
   * A node shared by several parents appears once under each of them.
   * @param sink Line writer, the package logger by default
   */
  dump(sink: LogSink = (line) => logger.info(line)): void {
    const visit = (v: Value, depth: number) => {
      const prefix = v.label ? `${v.label}: ` : '';
      sink(`${'  '.repeat(depth)}${prefix}data = ${v.data}, gradient = ${v.grad}`);
      for (const child of v.prev) visit(child, depth + 1);
    };
    visit(this, 0);
  }

  /**
   * Returns every node reachable from root, operands before the nodes that consume them.
   * Uses an explicit stack so very deep graphs don't overflow the call stack.
   * @param root Value to order from
   */
  static topologicalOrder(root: Value): Value[] {
    const topo: Value[] = [];
    const visited = new Set<Value>([root]);
    const stack: Array<{ node: Value; next: number }> = [{ node: root, next: 0 }];

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (frame.next < frame.node.prev.length) {
        const child = frame.node.prev[frame.next++];
        if (!visited.has(child)) {
          visited.add(child);
          stack.push({ node: child, next: 0 });
        }
      } else {
        stack.pop();
        topo.push(frame.node);
      }
    }
    return topo;
  }

  /**
   * Sets all grad fields in the computation tree (from root) to 0.
   * @param root Value to zero tree from
   */
  static zeroGradTree(root: Value): void {
    for (const v of Value.topologicalOrder(root)) v.grad = 0;
  }

  /**
   * Internal helper to construct a derived Value with its backward closure.
   * @param data Output value data
   * @param op Operation tag
   * @param operands Operand Values
   * @param backwardFnBuilder Function to create backward closure
   * @param label Node label for debugging
   * @returns New Value node
   */
  static make(
    data: number,
    op: Exclude<Operation, 'none'>,
    operands: Value[],
    backwardFnBuilder: (out: Value) => BackwardFn,
    label: string
  ): Value {
    const out = new Value(data, label);
    out._op = op;
    out._prev = operands;
    out.backwardFn = backwardFnBuilder(out);
    return out;
  }

  /**
   * Returns string representation for debugging.
   * @returns String summary of Value
   */
  toString(): string {
    return `Value(data=${this.data.toFixed(4)}, grad=${this.grad.toFixed(4)}, label=${this.label})`;
  }
}
