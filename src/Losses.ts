import { Value } from "./Value";
import { ValueArithmetic } from "./ValueArithmetic";

/**
 * Throws an error if outputs and targets length do not match.
 * @param outputs Array of output Values.
 * @param targets Array of target Values.
 */
function checkLengthMatch(outputs: Value[], targets: Value[]): void {
  if (outputs.length !== targets.length) {
    throw new Error(`Outputs and targets must have the same length (${outputs.length} vs ${targets.length})`);
  }
}

/**
 * Loss functions for training. All methods return a scalar Value to call backward() on.
 * @public
 */
export class Losses {
  /**
   * Computes mean squared error (MSE) loss between outputs and targets:
   * the squared differences are summed, then scaled by the constant 1/n.
   * @param outputs Array of Value predictions.
   * @param targets Array of Value targets.
   * @returns Mean squared error as a Value.
   */
  public static mse(outputs: Value[], targets: Value[]): Value {
    checkLengthMatch(outputs, targets);
    if (!outputs.length) return new Value(0);
    const squared = outputs.map((out, i) => out.sub(targets[i]).square());
    const total = ValueArithmetic.sum(squared);
    return total.mul(new Value(1 / outputs.length));
  }
}
