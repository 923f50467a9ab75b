import { FormulaError } from "@/lib/errors";

export type BinaryOperator = "+" | "-" | "*" | "/";

export type FunctionName = "abs" | "min" | "max" | "average" | "pow" | "sqrt" | "log" | "log10" | "exp" | "round";

export type Expression =
  | { readonly kind: "number"; readonly value: number }
  | { readonly kind: "column"; readonly name: string }
  | { readonly kind: "negate"; readonly operand: Expression }
  | {
      readonly kind: "binary";
      readonly operator: BinaryOperator;
      readonly left: Expression;
      readonly right: Expression;
    }
  | { readonly kind: "call"; readonly name: FunctionName; readonly args: readonly Expression[] };

const FUNCTION_ARITY: Record<FunctionName, { min: number; max: number }> = {
  abs: { min: 1, max: 1 },
  min: { min: 1, max: Number.POSITIVE_INFINITY },
  max: { min: 1, max: Number.POSITIVE_INFINITY },
  average: { min: 1, max: Number.POSITIVE_INFINITY },
  pow: { min: 2, max: 2 },
  sqrt: { min: 1, max: 1 },
  log: { min: 1, max: 1 },
  log10: { min: 1, max: 1 },
  exp: { min: 1, max: 1 },
  round: { min: 1, max: 2 },
};

type TokenType = "number" | "column" | "identifier" | "operator" | "lparen" | "rparen" | "comma" | "eof";

interface Token {
  type: TokenType;
  value: string;
  position: number;
}

function isFunctionName(name: string): name is FunctionName {
  return Object.prototype.hasOwnProperty.call(FUNCTION_ARITY, name);
}

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const char = source[i];

    if (/\s/.test(char)) {
      i += 1;
      continue;
    }

    if (char === '"' || char === "'") {
      const end = source.indexOf(char, i + 1);
      if (end === -1) {
        throw new FormulaError(`Unterminated quoted column name at position ${i}`, source, [], i);
      }
      const name = source.slice(i + 1, end);
      if (name.length === 0) {
        throw new FormulaError(`Empty column name at position ${i}`, source, [], i);
      }
      tokens.push({ type: "column", value: name, position: i });
      i = end + 1;
      continue;
    }

    if (/[0-9]/.test(char) || (char === "." && /[0-9]/.test(source[i + 1] ?? ""))) {
      const match = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/.exec(source.slice(i));
      const literal = match ? match[0] : char;
      tokens.push({ type: "number", value: literal, position: i });
      i += literal.length;
      continue;
    }

    if (/[A-Za-z_]/.test(char)) {
      const match = /^[A-Za-z_][A-Za-z0-9_]*/.exec(source.slice(i));
      const identifier = match ? match[0] : char;
      tokens.push({ type: "identifier", value: identifier, position: i });
      i += identifier.length;
      continue;
    }

    if (char === "+" || char === "-" || char === "*" || char === "/") {
      tokens.push({ type: "operator", value: char, position: i });
    } else if (char === "(") {
      tokens.push({ type: "lparen", value: char, position: i });
    } else if (char === ")") {
      tokens.push({ type: "rparen", value: char, position: i });
    } else if (char === ",") {
      tokens.push({ type: "comma", value: char, position: i });
    } else {
      throw new FormulaError(`Unexpected character "${char}" at position ${i}`, source, [], i);
    }
    i += 1;
  }

  tokens.push({ type: "eof", value: "", position: source.length });
  return tokens;
}

class Parser {
  private index = 0;

  constructor(
    private readonly source: string,
    private readonly tokens: Token[],
  ) {}

  parse(): Expression {
    const expression = this.parseAdditive();
    const trailing = this.peek();
    if (trailing.type !== "eof") {
      this.fail(`Unexpected "${trailing.value}"`, trailing);
    }
    return expression;
  }

  private peek(): Token {
    return this.tokens[this.index];
  }

  private consume(): Token {
    const token = this.tokens[this.index];
    if (token.type !== "eof") {
      this.index += 1;
    }
    return token;
  }

  private fail(message: string, token: Token): never {
    const at = token.type === "eof" ? "end of formula" : `position ${token.position}`;
    throw new FormulaError(`${message} at ${at}`, this.source, [], token.position);
  }

  private expect(type: TokenType, description: string): Token {
    const token = this.peek();
    if (token.type !== type) {
      this.fail(`Expected ${description}`, token);
    }
    return this.consume();
  }

  private isOperator(...operators: BinaryOperator[]): boolean {
    const token = this.peek();
    return token.type === "operator" && operators.some((operator) => operator === token.value);
  }

  private parseAdditive(): Expression {
    let left = this.parseMultiplicative();
    while (this.isOperator("+", "-")) {
      const operator = this.consume().value === "+" ? "+" : "-";
      const right = this.parseMultiplicative();
      left = { kind: "binary", operator, left, right };
    }
    return left;
  }

  private parseMultiplicative(): Expression {
    let left = this.parseUnary();
    while (this.isOperator("*", "/")) {
      const operator = this.consume().value === "*" ? "*" : "/";
      const right = this.parseUnary();
      left = { kind: "binary", operator, left, right };
    }
    return left;
  }

  private parseUnary(): Expression {
    if (this.isOperator("-")) {
      this.consume();
      return { kind: "negate", operand: this.parseUnary() };
    }
    if (this.isOperator("+")) {
      this.consume();
      return this.parseUnary();
    }
    return this.parsePrimary();
  }

  private parsePrimary(): Expression {
    const token = this.peek();

    switch (token.type) {
      case "number": {
        this.consume();
        const value = Number(token.value);
        if (!Number.isFinite(value)) {
          this.fail(`Invalid number "${token.value}"`, token);
        }
        return { kind: "number", value };
      }
      case "column":
        this.consume();
        return { kind: "column", name: token.value };
      case "identifier":
        this.consume();
        return this.parseCall(token);
      case "lparen": {
        this.consume();
        const inner = this.parseAdditive();
        this.expect("rparen", '")"');
        return inner;
      }
      default:
        return this.fail(token.type === "eof" ? "Unexpected end of formula" : `Unexpected "${token.value}"`, token);
    }
  }

  private parseCall(token: Token): Expression {
    const name = token.value.toLowerCase();
    if (!isFunctionName(name)) {
      if (this.peek().type === "lparen") {
        this.fail(`Unknown function "${token.value}"`, token);
      }
      this.fail(`Bare identifier "${token.value}" (quote column names)`, token);
    }

    this.expect("lparen", `"(" after ${name}`);
    const args: Expression[] = [];
    if (this.peek().type !== "rparen") {
      args.push(this.parseAdditive());
      while (this.peek().type === "comma") {
        this.consume();
        args.push(this.parseAdditive());
      }
    }
    this.expect("rparen", `")" to close ${name}(`);

    const arity = FUNCTION_ARITY[name];
    if (args.length < arity.min || args.length > arity.max) {
      const expected =
        arity.min === arity.max
          ? `${arity.min}`
          : arity.max === Number.POSITIVE_INFINITY
            ? `at least ${arity.min}`
            : `${arity.min}-${arity.max}`;
      this.fail(`${name}() takes ${expected} argument(s), got ${args.length}`, token);
    }
    return { kind: "call", name, args };
  }
}

export function parseExpression(source: string): Expression {
  if (source.trim().length === 0) {
    throw new FormulaError("Formula is empty", source);
  }
  return new Parser(source, tokenize(source)).parse();
}

export function referencedColumns(expression: Expression): string[] {
  const columns: string[] = [];
  const visit = (node: Expression) => {
    switch (node.kind) {
      case "column":
        if (!columns.includes(node.name)) {
          columns.push(node.name);
        }
        break;
      case "negate":
        visit(node.operand);
        break;
      case "binary":
        visit(node.left);
        visit(node.right);
        break;
      case "call":
        node.args.forEach(visit);
        break;
      case "number":
        break;
    }
  };
  visit(expression);
  return columns;
}

const PRECEDENCE: Record<BinaryOperator, number> = { "+": 1, "-": 1, "*": 2, "/": 2 };

export function formatExpression(expression: Expression): string {
  switch (expression.kind) {
    case "number":
      return String(expression.value);
    case "column":
      return `"${expression.name}"`;
    case "negate": {
      const inner = formatExpression(expression.operand);
      return expression.operand.kind === "binary" ? `-(${inner})` : `-${inner}`;
    }
    case "call":
      return `${expression.name}(${expression.args.map(formatExpression).join(", ")})`;
    case "binary": {
      const own = PRECEDENCE[expression.operator];
      const wrap = (node: Expression, rightSide: boolean) => {
        const text = formatExpression(node);
        if (node.kind !== "binary") {
          return text;
        }
        const child = PRECEDENCE[node.operator];
        // Same-precedence right operands keep their grouping: a - (b - c).
        const needsParens = child < own || (rightSide && child === own);
        return needsParens ? `(${text})` : text;
      };
      return `${wrap(expression.left, false)} ${expression.operator} ${wrap(expression.right, true)}`;
    }
  }
}
