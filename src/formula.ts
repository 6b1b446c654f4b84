/**
 * Formula grammar shared by catalog templates and rendered expressions.
 *
 *   expr    := term (("+" | "-") term)*
 *   term    := unary (("*" | "/") unary)*
 *   unary   := "-" unary | power
 *   power   := primary ("^" INTEGER)?
 *   primary := NUMBER | FUNCTION "(" expr ")" | IDENTIFIER | "(" expr ")"
 *
 * Integer powers are expanded into repeated multiplication while parsing, so
 * the tree only ever holds the four arithmetic operators plus a few unary
 * functions that every raster-algebra engine understands.
 */

import { FormulaSyntaxError } from "./errors.js";

export const FORMULA_FUNCTIONS = ["sqrt", "log", "abs"] as const;

export type FormulaFunction = (typeof FORMULA_FUNCTIONS)[number];

export type BinaryOperator = "+" | "-" | "*" | "/";

export type FormulaNode =
  | { kind: "number"; value: number; raw: string }
  | { kind: "identifier"; name: string }
  | { kind: "negate"; operand: FormulaNode }
  | { kind: "binary"; operator: BinaryOperator; left: FormulaNode; right: FormulaNode }
  | { kind: "call"; fn: FormulaFunction; argument: FormulaNode };

const MAX_EXPONENT = 8;

type Token =
  | { type: "number"; text: string; position: number }
  | { type: "identifier"; text: string; position: number }
  | { type: "operator"; text: "+" | "-" | "*" | "/" | "^"; position: number }
  | { type: "paren"; text: "(" | ")"; position: number }
  | { type: "end"; text: ""; position: number };

const NUMBER_RE = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;
const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_.@]*/;

function isFormulaFunction(name: string): name is FormulaFunction {
  return (FORMULA_FUNCTIONS as readonly string[]).includes(name);
}

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < source.length) {
    const ch = source[i];
    if (ch === " " || ch === "\t" || ch === "\n") {
      i++;
      continue;
    }
    if (ch === "+" || ch === "-" || ch === "*" || ch === "/" || ch === "^") {
      tokens.push({ type: "operator", text: ch, position: i });
      i++;
      continue;
    }
    if (ch === "(" || ch === ")") {
      tokens.push({ type: "paren", text: ch, position: i });
      i++;
      continue;
    }
    const rest = source.slice(i);
    const numberMatch = NUMBER_RE.exec(rest);
    if (numberMatch) {
      tokens.push({ type: "number", text: numberMatch[0], position: i });
      i += numberMatch[0].length;
      continue;
    }
    const identifierMatch = IDENTIFIER_RE.exec(rest);
    if (identifierMatch) {
      tokens.push({ type: "identifier", text: identifierMatch[0], position: i });
      i += identifierMatch[0].length;
      continue;
    }
    throw new FormulaSyntaxError(`Unexpected character '${ch}'`, source, i);
  }
  tokens.push({ type: "end", text: "", position: source.length });
  return tokens;
}

class Parser {
  private index = 0;

  constructor(
    private readonly source: string,
    private readonly tokens: Token[]
  ) {}

  parse(): FormulaNode {
    const node = this.expression();
    const next = this.peek();
    if (next.type !== "end") {
      throw this.error(`Unexpected '${next.text}'`, next);
    }
    return node;
  }

  private peek(): Token {
    return this.tokens[this.index];
  }

  private advance(): Token {
    const token = this.tokens[this.index];
    if (token.type !== "end") this.index++;
    return token;
  }

  private error(message: string, token: Token): FormulaSyntaxError {
    return new FormulaSyntaxError(message, this.source, token.position);
  }

  private isOperator(token: Token, ...operators: string[]): boolean {
    return token.type === "operator" && operators.includes(token.text);
  }

  private expression(): FormulaNode {
    let left = this.term();
    for (let next = this.peek(); this.isOperator(next, "+", "-"); next = this.peek()) {
      this.advance();
      const operator = next.text === "+" ? "+" : "-";
      left = { kind: "binary", operator, left, right: this.term() };
    }
    return left;
  }

  private term(): FormulaNode {
    let left = this.unary();
    for (let next = this.peek(); this.isOperator(next, "*", "/"); next = this.peek()) {
      this.advance();
      const operator = next.text === "*" ? "*" : "/";
      left = { kind: "binary", operator, left, right: this.unary() };
    }
    return left;
  }

  private unary(): FormulaNode {
    if (this.isOperator(this.peek(), "-")) {
      this.advance();
      return { kind: "negate", operand: this.unary() };
    }
    return this.power();
  }

  private power(): FormulaNode {
    const base = this.primary();
    if (!this.isOperator(this.peek(), "^")) {
      return base;
    }
    this.advance();
    const exponentToken = this.advance();
    if (exponentToken.type !== "number" || !/^\d+$/.test(exponentToken.text)) {
      throw this.error("Exponent must be a positive integer literal", exponentToken);
    }
    const exponent = Number(exponentToken.text);
    if (exponent < 1 || exponent > MAX_EXPONENT) {
      throw this.error(`Exponent must be between 1 and ${MAX_EXPONENT}`, exponentToken);
    }
    let product = base;
    for (let i = 1; i < exponent; i++) {
      product = { kind: "binary", operator: "*", left: product, right: base };
    }
    return product;
  }

  private primary(): FormulaNode {
    const token = this.advance();
    switch (token.type) {
      case "number":
        return { kind: "number", value: Number(token.text), raw: token.text };
      case "identifier": {
        if (this.peek().type === "paren" && this.peek().text === "(") {
          const fn = token.text;
          if (!isFormulaFunction(fn)) {
            throw this.error(`Unknown function '${fn}'`, token);
          }
          this.advance();
          const argument = this.expression();
          this.expectClose();
          return { kind: "call", fn, argument };
        }
        return { kind: "identifier", name: token.text };
      }
      case "paren":
        if (token.text === "(") {
          const inner = this.expression();
          this.expectClose();
          return inner;
        }
        throw this.error("Unexpected ')'", token);
      case "operator":
        throw this.error(`Unexpected operator '${token.text}'`, token);
      case "end":
        throw this.error("Unexpected end of formula", token);
    }
  }

  private expectClose(): void {
    const token = this.advance();
    if (token.type !== "paren" || token.text !== ")") {
      throw this.error("Expected ')'", token);
    }
  }
}

export function parseFormula(source: string): FormulaNode {
  return new Parser(source, tokenize(source)).parse();
}

/**
 * Distinct identifiers in first-occurrence order
 */
export function formulaIdentifiers(node: FormulaNode): string[] {
  const seen = new Set<string>();
  const visit = (current: FormulaNode): void => {
    switch (current.kind) {
      case "identifier":
        seen.add(current.name);
        break;
      case "negate":
        visit(current.operand);
        break;
      case "binary":
        visit(current.left);
        visit(current.right);
        break;
      case "call":
        visit(current.argument);
        break;
      case "number":
        break;
    }
  };
  visit(node);
  return [...seen];
}

const ADDITIVE = 1;
const MULTIPLICATIVE = 2;
const UNARY = 3;
const ATOM = 4;

function precedence(node: FormulaNode): number {
  switch (node.kind) {
    case "binary":
      return node.operator === "+" || node.operator === "-" ? ADDITIVE : MULTIPLICATIVE;
    case "negate":
      return UNARY;
    default:
      return ATOM;
  }
}

export interface RenderOptions {
  /** Maps an identifier in the tree to the text emitted for it */
  resolve: (name: string) => string;
  /** Literal appended to every denominator */
  guard: string;
}

/**
 * Print a tree back to text with the fewest parentheses precedence allows.
 * Every division, literal divisors included, is emitted as
 * `numerator / (denominator + guard)`.
 */
export function renderFormula(node: FormulaNode, options: RenderOptions): string {
  const render = (current: FormulaNode): string => {
    switch (current.kind) {
      case "number":
        return current.raw;
      case "identifier":
        return options.resolve(current.name);
      case "call":
        return `${current.fn}(${render(current.argument)})`;
      case "negate": {
        const operand = render(current.operand);
        const wrap = precedence(current.operand) < ATOM;
        return wrap ? `-(${operand})` : `-${operand}`;
      }
      case "binary": {
        const own = precedence(current);
        const leftText = render(current.left);
        const left = precedence(current.left) < own ? `(${leftText})` : leftText;
        if (current.operator === "/") {
          // Additive is the loosest level, so the denominator never needs inner parentheses.
          return `${left} / (${render(current.right)} + ${options.guard})`;
        }
        const rightText = render(current.right);
        const rightPrecedence = precedence(current.right);
        const associative =
          current.right.kind === "binary" &&
          current.right.operator === current.operator &&
          (current.operator === "+" || current.operator === "*");
        const wrapRight = rightPrecedence < own || (rightPrecedence === own && !associative);
        const right = wrapRight ? `(${rightText})` : rightText;
        return `${left} ${current.operator} ${right}`;
      }
    }
  };
  return render(node);
}
