import { type AttributeValue, DynamoDBServiceException } from "@aws-sdk/client-dynamodb"
import type { AttributeMap } from "../../core/schema/cache-item"

export function validationException(message: string): DynamoDBServiceException {
  return new DynamoDBServiceException({
    name: "ValidationException",
    $fault: "client",
    $metadata: { httpStatusCode: 400 },
    message,
  })
}

type Token =
  | { kind: "name"; text: string }
  | { kind: "value"; text: string }
  | { kind: "word"; text: string }
  | { kind: "op"; text: string }
  | { kind: "punct"; text: string }

const TOKEN = /\s*(?:(#[A-Za-z0-9_]+)|(:[A-Za-z0-9_]+)|([A-Za-z_][A-Za-z0-9_]*)|(<>|<=|>=|[=<>+-])|([(),]))\s*/y

function tokenize(source: string): Token[] {
  const tokens: Token[] = []
  TOKEN.lastIndex = 0

  while (TOKEN.lastIndex < source.length) {
    const start = TOKEN.lastIndex
    const match = TOKEN.exec(source)
    if (!match) {
      throw validationException(`Invalid expression: unexpected input at offset ${start}: ${source}`)
    }

    const [, name, value, word, op, punct] = match
    if (name !== undefined) tokens.push({ kind: "name", text: name })
    else if (value !== undefined) tokens.push({ kind: "value", text: value })
    else if (word !== undefined) tokens.push({ kind: "word", text: word })
    else if (op !== undefined) tokens.push({ kind: "op", text: op })
    else if (punct !== undefined) tokens.push({ kind: "punct", text: punct })
  }

  return tokens
}

/**
 * Resolves `#name` and `:value` placeholders for one request and tracks which
 * were used, since the store rejects requests carrying unused ones.
 */
export class ExpressionScope {
  private readonly usedNames = new Set<string>()
  private readonly usedValues = new Set<string>()

  constructor(
    private readonly names: Record<string, string> = {},
    private readonly values: AttributeMap = {},
  ) {}

  name(placeholder: string): string {
    const name = this.names[placeholder]
    if (name === undefined) {
      throw validationException(
        `Invalid expression: An expression attribute name used in the document path is not defined; attribute name: ${placeholder}`,
      )
    }

    this.usedNames.add(placeholder)
    return name
  }

  value(placeholder: string): AttributeValue {
    const value = this.values[placeholder]
    if (value === undefined) {
      throw validationException(
        `Invalid expression: An expression attribute value used in expression is not defined; attribute value: ${placeholder}`,
      )
    }

    this.usedValues.add(placeholder)
    return value
  }

  assertAllUsed(): void {
    const unusedNames = Object.keys(this.names).filter((name) => !this.usedNames.has(name))
    if (unusedNames.length > 0) {
      throw validationException(
        `Value provided in ExpressionAttributeNames unused in expressions: keys: {${unusedNames.join(", ")}}`,
      )
    }

    const unusedValues = Object.keys(this.values).filter((value) => !this.usedValues.has(value))
    if (unusedValues.length > 0) {
      throw validationException(
        `Value provided in ExpressionAttributeValues unused in expressions: keys: {${unusedValues.join(", ")}}`,
      )
    }
  }
}

export type Operand = { kind: "path"; name: string } | { kind: "value"; value: AttributeValue }

export type Comparator = "=" | "<>" | "<" | "<=" | ">" | ">="

export type Condition =
  | { kind: "and" | "or"; left: Condition; right: Condition }
  | { kind: "not"; inner: Condition }
  | { kind: "exists" | "not_exists"; name: string }
  | { kind: "begins_with"; name: string; prefix: Operand }
  | { kind: "compare"; op: Comparator; left: Operand; right: Operand }

export type UpdateOperand = Operand | { kind: "if_not_exists"; name: string; fallback: Operand }

export type UpdateValue =
  | { kind: "operand"; operand: UpdateOperand }
  | { kind: "arith"; op: "+" | "-"; left: UpdateOperand; right: UpdateOperand }

export type UpdatePlan = {
  set: { name: string; value: UpdateValue }[]
  remove: string[]
}

const comparators = new Set<string>(["=", "<>", "<", "<=", ">", ">="])

function isComparator(text: string): text is Comparator {
  return comparators.has(text)
}

class Parser {
  private pos = 0
  private readonly tokens: Token[]

  constructor(
    private readonly source: string,
    private readonly scope: ExpressionScope,
  ) {
    this.tokens = tokenize(source)
  }

  condition(): Condition {
    const cond = this.or()
    this.end()
    return cond
  }

  update(): UpdatePlan {
    const plan: UpdatePlan = { set: [], remove: [] }

    while (!this.atEnd()) {
      if (this.acceptWord("SET")) {
        do {
          const name = this.path()
          this.expect("=")
          plan.set.push({ name, value: this.updateValue() })
        } while (this.accept(","))
      } else if (this.acceptWord("REMOVE")) {
        do {
          plan.remove.push(this.path())
        } while (this.accept(","))
      } else {
        throw this.unexpected()
      }
    }

    return plan
  }

  projection(): string[] {
    const names = [this.path()]
    while (this.accept(",")) names.push(this.path())
    this.end()
    return names
  }

  private or(): Condition {
    let left = this.and()
    while (this.acceptWord("OR")) {
      left = { kind: "or", left, right: this.and() }
    }
    return left
  }

  private and(): Condition {
    let left = this.not()
    while (this.acceptWord("AND")) {
      left = { kind: "and", left, right: this.not() }
    }
    return left
  }

  private not(): Condition {
    if (this.acceptWord("NOT")) return { kind: "not", inner: this.not() }
    return this.primary()
  }

  private primary(): Condition {
    if (this.accept("(")) {
      const inner = this.or()
      this.expect(")")
      return inner
    }

    if (this.acceptWord("attribute_exists")) {
      return { kind: "exists", name: this.singlePathArgument() }
    }

    if (this.acceptWord("attribute_not_exists")) {
      return { kind: "not_exists", name: this.singlePathArgument() }
    }

    if (this.acceptWord("begins_with")) {
      this.expect("(")
      const name = this.path()
      this.expect(",")
      const prefix = this.operand()
      this.expect(")")
      return { kind: "begins_with", name, prefix }
    }

    const left = this.operand()
    const token = this.next()
    const op = token?.kind === "op" ? token.text : ""
    if (!isComparator(op)) throw this.unexpected(token)

    return { kind: "compare", op, left, right: this.operand() }
  }

  private updateValue(): UpdateValue {
    const left = this.updateOperand()

    const token = this.peek()
    const op = token?.kind === "op" ? token.text : undefined
    if (op === "+" || op === "-") {
      this.pos++
      return { kind: "arith", op, left, right: this.updateOperand() }
    }

    return { kind: "operand", operand: left }
  }

  private updateOperand(): UpdateOperand {
    if (this.acceptWord("if_not_exists")) {
      this.expect("(")
      const name = this.path()
      this.expect(",")
      const fallback = this.operand()
      this.expect(")")
      return { kind: "if_not_exists", name, fallback }
    }

    return this.operand()
  }

  private singlePathArgument(): string {
    this.expect("(")
    const name = this.path()
    this.expect(")")
    return name
  }

  private operand(): Operand {
    const token = this.peek()
    if (token?.kind === "value") {
      this.pos++
      return { kind: "value", value: this.scope.value(token.text) }
    }

    return { kind: "path", name: this.path() }
  }

  private path(): string {
    const token = this.next()
    if (token?.kind === "name") return this.scope.name(token.text)
    if (token?.kind === "word") return token.text

    throw this.unexpected(token)
  }

  private peek(): Token | undefined {
    return this.tokens[this.pos]
  }

  private next(): Token | undefined {
    const token = this.tokens[this.pos]
    if (token) this.pos++
    return token
  }

  private atEnd(): boolean {
    return this.pos >= this.tokens.length
  }

  private accept(text: string): boolean {
    const token = this.peek()
    if (token && (token.kind === "punct" || token.kind === "op") && token.text === text) {
      this.pos++
      return true
    }
    return false
  }

  private acceptWord(word: string): boolean {
    const token = this.peek()
    const next = this.tokens[this.pos + 1]

    if (token?.kind !== "word" || token.text.toUpperCase() !== word.toUpperCase()) return false
    // a function name must be followed by its argument list
    if (word === word.toLowerCase() && !(next?.kind === "punct" && next.text === "(")) return false

    this.pos++
    return true
  }

  private expect(text: string): void {
    if (!this.accept(text)) throw this.unexpected(this.peek())
  }

  private end(): void {
    if (!this.atEnd()) throw this.unexpected(this.peek())
  }

  private unexpected(token: Token | undefined = this.peek()): DynamoDBServiceException {
    const found = token ? `token: "${token.text}"` : "end of input"
    return validationException(`Invalid expression: Syntax error; ${found}; expression: ${this.source}`)
  }
}

export function parseCondition(expression: string, scope: ExpressionScope): Condition {
  return new Parser(expression, scope).condition()
}

export function parseUpdate(expression: string, scope: ExpressionScope): UpdatePlan {
  return new Parser(expression, scope).update()
}

export function parseProjection(expression: string, scope: ExpressionScope): string[] {
  return new Parser(expression, scope).projection()
}

export function evaluate(cond: Condition, item: AttributeMap): boolean {
  switch (cond.kind) {
    case "and":
      return evaluate(cond.left, item) && evaluate(cond.right, item)
    case "or":
      return evaluate(cond.left, item) || evaluate(cond.right, item)
    case "not":
      return !evaluate(cond.inner, item)
    case "exists":
      return item[cond.name] !== undefined
    case "not_exists":
      return item[cond.name] === undefined
    case "begins_with":
      return beginsWith(item[cond.name], resolve(cond.prefix, item))
    case "compare":
      return compare(cond.op, resolve(cond.left, item), resolve(cond.right, item))
  }
}

/**
 * Apply an update plan. Every right-hand side sees the item as it was before
 * the update.
 *
 * @returns The new item and the names of the attributes it set.
 */
export function applyUpdate(
  plan: UpdatePlan,
  item: AttributeMap,
): { item: AttributeMap; updated: string[] } {
  const next: AttributeMap = { ...item }

  for (const { name, value } of plan.set) {
    next[name] = updateValueOf(value, item)
  }
  for (const name of plan.remove) {
    delete next[name]
  }

  return { item: next, updated: plan.set.map(({ name }) => name) }
}

export function project(item: AttributeMap, names: readonly string[]): AttributeMap {
  const out: AttributeMap = {}
  for (const name of names) {
    const value = item[name]
    if (value !== undefined) out[name] = value
  }
  return out
}

function resolve(operand: Operand, item: AttributeMap): AttributeValue | undefined {
  return operand.kind === "value" ? operand.value : item[operand.name]
}

function updateValueOf(value: UpdateValue, item: AttributeMap): AttributeValue {
  if (value.kind === "operand") return updateOperandOf(value.operand, item)

  const left = updateOperandOf(value.left, item).N
  const right = updateOperandOf(value.right, item).N
  if (left === undefined || right === undefined) {
    throw validationException("An operand in the update expression has an incorrect data type")
  }

  const result = value.op === "+" ? Number(left) + Number(right) : Number(left) - Number(right)
  return { N: String(result) }
}

function updateOperandOf(operand: UpdateOperand, item: AttributeMap): AttributeValue {
  const value =
    operand.kind === "if_not_exists"
      ? (item[operand.name] ?? resolve(operand.fallback, item))
      : resolve(operand, item)

  if (value === undefined) {
    throw validationException(
      "The provided expression refers to an attribute that does not exist in the item",
    )
  }

  return value
}

function beginsWith(value: AttributeValue | undefined, prefix: AttributeValue | undefined): boolean {
  if (value?.S !== undefined && prefix?.S !== undefined) return value.S.startsWith(prefix.S)

  if (value?.B !== undefined && prefix?.B !== undefined) {
    const bytes = Buffer.from(value.B)
    return bytes.subarray(0, prefix.B.byteLength).equals(Buffer.from(prefix.B))
  }

  return false
}

function compare(
  op: Comparator,
  left: AttributeValue | undefined,
  right: AttributeValue | undefined,
): boolean {
  const order = left && right ? ordering(left, right) : undefined

  if (order === undefined) return op === "<>"

  switch (op) {
    case "=":
      return order === 0
    case "<>":
      return order !== 0
    case "<":
      return order < 0
    case "<=":
      return order <= 0
    case ">":
      return order > 0
    case ">=":
      return order >= 0
  }
}

/**
 * Sign of `left - right` for two scalars of the same type; `undefined` when
 * they cannot be compared. Booleans and nulls only compare for equality.
 */
function ordering(left: AttributeValue, right: AttributeValue): number | undefined {
  if (left.N !== undefined && right.N !== undefined) return Math.sign(Number(left.N) - Number(right.N))
  if (left.S !== undefined && right.S !== undefined) {
    return Buffer.compare(Buffer.from(left.S, "utf8"), Buffer.from(right.S, "utf8"))
  }
  if (left.B !== undefined && right.B !== undefined) {
    return Buffer.compare(Buffer.from(left.B), Buffer.from(right.B))
  }
  if (left.BOOL !== undefined && right.BOOL !== undefined) return left.BOOL === right.BOOL ? 0 : NaN
  if (left.NULL !== undefined && right.NULL !== undefined) return 0

  return undefined
}
