/**
 * Single-pixel evaluation of rendered expressions, for spot checks before an
 * expression is handed to the raster engine.
 */

import { ExpressionError } from "./errors.js";
import {
  type BinaryOperator,
  type FormulaFunction,
  type FormulaNode,
  parseFormula,
} from "./formula.js";

function applyFunction(fn: FormulaFunction, argument: number): number {
  switch (fn) {
    case "sqrt":
      return Math.sqrt(argument);
    case "log":
      return Math.log(argument);
    case "abs":
      return Math.abs(argument);
  }
}

function applyOperator(operator: BinaryOperator, left: number, right: number): number {
  switch (operator) {
    case "+":
      return left + right;
    case "-":
      return left - right;
    case "*":
      return left * right;
    case "/":
      return left / right;
  }
}

function evaluateNode(node: FormulaNode, values: Readonly<Record<string, number>>): number {
  switch (node.kind) {
    case "number":
      return node.value;
    case "identifier": {
      if (!Object.prototype.hasOwnProperty.call(values, node.name)) {
        throw new ExpressionError(`No value supplied for band '${node.name}'`);
      }
      return values[node.name];
    }
    case "negate":
      return -evaluateNode(node.operand, values);
    case "call":
      return applyFunction(node.fn, evaluateNode(node.argument, values));
    case "binary":
      return applyOperator(
        node.operator,
        evaluateNode(node.left, values),
        evaluateNode(node.right, values)
      );
  }
}

/**
 * Evaluate an expression string for one pixel, with band identifiers bound to
 * reflectance values. `log` is the natural logarithm.
 * @throws ExpressionError when an identifier has no value
 */
export function evaluateExpression(
  expression: string,
  values: Readonly<Record<string, number>>
): number {
  return evaluateNode(parseFormula(expression), values);
}
