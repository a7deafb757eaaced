import { BaseError } from "@knobs/errors"

export class ExpressionError extends BaseError<"expression"> {
  constructor(expression: string, reason: string) {
    super(`cannot evaluate ${JSON.stringify(expression)}: ${reason}`, {
      context: { expression },
      code: "expression",
    })
  }
}

export type Variables = Readonly<Record<string, number>>

type Token =
  | { type: "number"; value: number; at: number }
  | { type: "name"; value: string; at: number }
  | { type: "op"; value: string; at: number }

const NUMBER = /^(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/
const NAME = /^[A-Za-z_]\w*/
const OPERATORS = ["**", "//", "+", "-", "*", "/", "%", "(", ")"]

function tokenize(expression: string): Token[] {
  const tokens: Token[] = []
  let i = 0

  while (i < expression.length) {
    const rest = expression.slice(i)

    if (/^\s/.test(rest)) {
      i += 1
      continue
    }

    const number = NUMBER.exec(rest)
    if (number) {
      tokens.push({ type: "number", value: Number(number[0]), at: i })
      i += number[0].length
      continue
    }

    const name = NAME.exec(rest)
    if (name) {
      tokens.push({ type: "name", value: name[0], at: i })
      i += name[0].length
      continue
    }

    const op = OPERATORS.find((candidate) => rest.startsWith(candidate))
    if (op === undefined) {
      throw new ExpressionError(expression, `unexpected ${JSON.stringify(rest[0])} at ${i}`)
    }
    tokens.push({ type: "op", value: op, at: i })
    i += op.length
  }

  return tokens
}

/** Floor division and modulo follow the sign of the divisor. */
function binary(expression: string, op: string, left: number, right: number): number {
  if ((op === "/" || op === "//" || op === "%") && right === 0) {
    throw new ExpressionError(expression, "division by zero")
  }

  switch (op) {
    case "+":
      return left + right
    case "-":
      return left - right
    case "*":
      return left * right
    case "/":
      return left / right
    case "//":
      return Math.floor(left / right)
    case "%":
      return left - right * Math.floor(left / right)
    case "**":
      return left ** right
    default:
      throw new ExpressionError(expression, `unknown operator ${op}`)
  }
}

/**
 * Recursive-descent evaluator.
 *
 *   expr  := term (("+" | "-") term)*
 *   term  := unary (("*" | "/" | "//" | "%") unary)*
 *   unary := ("+" | "-") unary | power
 *   power := atom ("**" unary)?
 *   atom  := NUMBER | NAME | "(" expr ")"
 */
class Parser {
  private pos = 0

  constructor(
    private readonly expression: string,
    private readonly tokens: readonly Token[],
    private readonly vars: Variables,
  ) {}

  parse(): number {
    if (this.tokens.length === 0) throw new ExpressionError(this.expression, "empty expression")

    const result = this.expr()
    const extra = this.tokens[this.pos]
    if (extra !== undefined) {
      throw new ExpressionError(this.expression, `unexpected ${JSON.stringify(String(extra.value))} at ${extra.at}`)
    }

    return result
  }

  private peekOp(...ops: string[]): string | undefined {
    const token = this.tokens[this.pos]
    if (token?.type === "op" && ops.includes(token.value)) return token.value
    return undefined
  }

  private expr(): number {
    let value = this.term()
    for (let op = this.peekOp("+", "-"); op !== undefined; op = this.peekOp("+", "-")) {
      this.pos += 1
      value = binary(this.expression, op, value, this.term())
    }
    return value
  }

  private term(): number {
    let value = this.unary()
    for (let op = this.peekOp("*", "/", "//", "%"); op !== undefined; op = this.peekOp("*", "/", "//", "%")) {
      this.pos += 1
      value = binary(this.expression, op, value, this.unary())
    }
    return value
  }

  private unary(): number {
    const op = this.peekOp("+", "-")
    if (op !== undefined) {
      this.pos += 1
      const operand = this.unary()
      return op === "-" ? -operand : operand
    }
    return this.power()
  }

  private power(): number {
    const base = this.atom()
    if (this.peekOp("**") !== undefined) {
      this.pos += 1
      return binary(this.expression, "**", base, this.unary())
    }
    return base
  }

  private atom(): number {
    const token = this.tokens[this.pos]
    if (token === undefined) throw new ExpressionError(this.expression, "unexpected end of expression")

    this.pos += 1

    if (token.type === "number") return token.value

    if (token.type === "name") {
      const value = Object.hasOwn(this.vars, token.value) ? this.vars[token.value] : undefined
      if (value === undefined) throw new ExpressionError(this.expression, `unknown variable ${token.value}`)
      return value
    }

    if (token.value === "(") {
      const value = this.expr()
      if (this.peekOp(")") === undefined) throw new ExpressionError(this.expression, "missing closing parenthesis")
      this.pos += 1
      return value
    }

    throw new ExpressionError(this.expression, `unexpected ${JSON.stringify(token.value)} at ${token.at}`)
  }
}

/**
 * Evaluates a plain arithmetic expression such as `"2 * (3 + x)"`.
 *
 * Supports `+ - * / // % **`, unary signs, parentheses and named
 * variables; nothing else is evaluated. Numbers pass through unchanged.
 */
export function arithmeticEval(expression: unknown, vars: Variables = {}): number {
  if (typeof expression === "number") return expression
  if (typeof expression !== "string") {
    throw new TypeError(`expected an arithmetic expression, got ${typeof expression}`)
  }

  for (const [name, value] of Object.entries(vars)) {
    if (!Number.isFinite(value)) throw new TypeError(`variable ${name} must be a finite number`)
  }

  return new Parser(expression, tokenize(expression), vars).parse()
}

/** Like arithmeticEval, truncated toward zero. */
export function intEval(expression: unknown, vars: Variables = {}): number {
  return Math.trunc(arithmeticEval(expression, vars))
}

export function floatEval(expression: unknown, vars: Variables = {}): number {
  return arithmeticEval(expression, vars)
}
