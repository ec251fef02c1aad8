import { DynamoDBServiceException } from "@aws-sdk/client-dynamodb"
import type { AttributeMap } from "../../../core/schema/cache-item"
import {
  applyUpdate,
  evaluate,
  ExpressionScope,
  parseCondition,
  parseProjection,
  parseUpdate,
  project,
} from "../expressions"

const item: AttributeMap = {
  pk: { S: "app:user:1" },
  v: { N: "10" },
  ttl: { N: "1700000060" },
  flag: { BOOL: true },
  blob: { B: new Uint8Array([1, 2, 3]) },
}

function check(
  expression: string,
  values: AttributeMap = {},
  names: Record<string, string> = { "#pk": "pk", "#v": "v", "#ttl": "ttl" },
): boolean {
  const scope = new ExpressionScope(names, values)
  return evaluate(parseCondition(expression, scope), item)
}

describe("conditions", () => {
  it("checks attribute presence", () => {
    expect(check("attribute_exists(#pk)", {}, { "#pk": "pk" })).toBe(true)
    expect(check("attribute_not_exists(#pk)", {}, { "#pk": "pk" })).toBe(false)
    expect(check("attribute_not_exists(missing)", {}, {})).toBe(true)
  })

  it("compares numbers numerically", () => {
    const names = { "#v": "v" }

    expect(check("#v > :a", { ":a": { N: "9" } }, names)).toBe(true)
    expect(check("#v = :b", { ":b": { N: "10.0" } }, names)).toBe(true)
    expect(check("#v >= :a", { ":a": { N: "9" } }, names)).toBe(true)
    expect(check("#v < :a", { ":a": { N: "9" } }, names)).toBe(false)
  })

  it("compares strings by bytes", () => {
    const names = { "#pk": "pk" }

    expect(check("#pk < :x", { ":x": { S: "b" } }, names)).toBe(true)
    expect(check("#pk <> :x", { ":x": { S: "app:user:1" } }, names)).toBe(false)
  })

  it("is false for every comparison with a missing attribute except <>", () => {
    const values = { ":x": { N: "1" } }

    expect(check("missing = :x", values, {})).toBe(false)
    expect(check("missing < :x", values, {})).toBe(false)
    expect(check("missing <> :x", values, {})).toBe(true)
  })

  it("does not order values of different types", () => {
    expect(check("v < :x", { ":x": { S: "99" } }, {})).toBe(false)
    expect(check("flag <> :x", { ":x": { BOOL: false } }, {})).toBe(true)
    expect(check("flag < :x", { ":x": { BOOL: false } }, {})).toBe(false)
  })

  it("combines with OR, AND, NOT and parentheses", () => {
    const values = { ":now": { N: "1700000000" } }

    expect(check("attribute_not_exists(#ttl) OR #ttl > :now", values, { "#ttl": "ttl" })).toBe(true)
    expect(
      check("attribute_exists(#pk) AND (attribute_not_exists(#ttl) OR #ttl <= :now)", values, {
        "#pk": "pk",
        "#ttl": "ttl",
      }),
    ).toBe(false)
    expect(check("NOT attribute_exists(#pk)", {}, { "#pk": "pk" })).toBe(false)
  })

  it("binds AND tighter than OR", () => {
    const values = { ":one": { N: "1" } }

    // true OR (false AND false)
    expect(check("attribute_exists(pk) OR missing = :one AND missing = :one", values, {})).toBe(
      true,
    )
    // (false AND ...) OR false
    expect(check("missing = :one AND attribute_exists(pk) OR missing = :one", values, {})).toBe(
      false,
    )
  })

  it("matches string and binary prefixes", () => {
    expect(check("begins_with(#pk, :p)", { ":p": { S: "app:" } }, { "#pk": "pk" })).toBe(true)
    expect(check("begins_with(#pk, :p)", { ":p": { S: "other:" } }, { "#pk": "pk" })).toBe(false)
    expect(check("begins_with(blob, :p)", { ":p": { B: new Uint8Array([1, 2]) } }, {})).toBe(true)
    expect(check("begins_with(v, :p)", { ":p": { S: "1" } }, {})).toBe(false)
  })

  it("rejects syntax errors", () => {
    expect(() => check("#pk = ", {}, { "#pk": "pk" })).toThrow(
      "Invalid expression: Syntax error; end of input; expression: #pk = ",
    )
    expect(() => check("attribute_exists(pk) pk", {}, {})).toThrow(
      'Invalid expression: Syntax error; token: "pk"; expression: attribute_exists(pk) pk',
    )
    expect(() => check("pk = $x", {}, {})).toThrow("unexpected input at offset 5")
  })

  it("rejects undefined placeholders", () => {
    expect(() => check("#nope = :x", { ":x": { N: "1" } }, {})).toThrow(
      "An expression attribute name used in the document path is not defined; attribute name: #nope",
    )
    expect(() => check("pk = :nope", {}, {})).toThrow(
      "An expression attribute value used in expression is not defined; attribute value: :nope",
    )
  })
})

describe("ExpressionScope", () => {
  it("rejects names and values no expression used", () => {
    const scope = new ExpressionScope({ "#pk": "pk", "#extra": "x" }, { ":v": { N: "1" } })
    parseCondition("#pk = :v", scope)

    expect(() => scope.assertAllUsed()).toThrow(
      "Value provided in ExpressionAttributeNames unused in expressions: keys: {#extra}",
    )
  })

  it("reports unused values", () => {
    const scope = new ExpressionScope({}, { ":a": { N: "1" }, ":b": { N: "2" } })
    parseCondition("pk = :a", scope)

    expect(() => scope.assertAllUsed()).toThrow(
      "Value provided in ExpressionAttributeValues unused in expressions: keys: {:b}",
    )
  })

  it("raises validation exceptions", () => {
    const scope = new ExpressionScope({ "#x": "x" })

    expect(() => scope.assertAllUsed()).toThrow(DynamoDBServiceException)
  })
})

describe("updates", () => {
  function update(expression: string, values: AttributeMap, base: AttributeMap = item) {
    const scope = new ExpressionScope({ "#val": "v", "#ttl": "ttl" }, values)
    const plan = parseUpdate(expression, scope)
    return applyUpdate(plan, base)
  }

  it("adds to an existing number", () => {
    const res = update("SET #val = if_not_exists(#val, :start) + :delta REMOVE #ttl", {
      ":start": { N: "0" },
      ":delta": { N: "5" },
    })

    expect(res.item.v).toStrictEqual({ N: "15" })
    expect(res.item.ttl).toBeUndefined()
    expect(res.updated).toStrictEqual(["v"])
  })

  it("starts from the fallback when the attribute is absent", () => {
    const res = update(
      "SET #val = if_not_exists(#val, :start) - :delta, #ttl = :ttl",
      { ":start": { N: "0" }, ":delta": { N: "2" }, ":ttl": { N: "1" } },
      { pk: { S: "k" } },
    )

    expect(res.item).toStrictEqual({ pk: { S: "k" }, v: { N: "-2" }, ttl: { N: "1" } })
    expect(res.updated).toStrictEqual(["v", "ttl"])
  })

  it("rejects arithmetic on non-numbers", () => {
    expect(() =>
      update(
        "SET #val = if_not_exists(#val, :start) + :delta REMOVE #ttl",
        { ":start": { N: "0" }, ":delta": { N: "1" } },
        { pk: { S: "k" }, v: { S: "abc" } },
      ),
    ).toThrow("An operand in the update expression has an incorrect data type")
  })

  it("rejects references to absent attributes", () => {
    expect(() => update("SET #val = #ttl REMOVE #ttl", {}, { pk: { S: "k" } })).toThrow(
      "The provided expression refers to an attribute that does not exist in the item",
    )
  })

  it("does not mutate the input item", () => {
    const base: AttributeMap = { pk: { S: "k" }, v: { N: "1" }, ttl: { N: "5" } }

    update("SET #val = :x REMOVE #ttl", { ":x": { S: "new" } }, base)

    expect(base).toStrictEqual({ pk: { S: "k" }, v: { N: "1" }, ttl: { N: "5" } })
  })
})

describe("projections", () => {
  it("keeps the named attributes that exist", () => {
    const scope = new ExpressionScope({ "#pk": "pk", "#ovf": "overflow_ref" })
    const names = parseProjection("#pk, #ovf, v", scope)

    expect(names).toStrictEqual(["pk", "overflow_ref", "v"])
    expect(project(item, names)).toStrictEqual({ pk: { S: "app:user:1" }, v: { N: "10" } })
  })
})
