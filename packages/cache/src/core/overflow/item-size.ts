import type { AttributeValue } from "@aws-sdk/client-dynamodb"
import type { AttributeMap } from "../schema/cache-item"

/** Store limit on the size of a single item, attribute names included. */
export const MAX_ITEM_BYTES = 400 * 1024

/**
 * Size of an item as the store accounts for it: UTF-8 attribute names plus
 * the size of each value.
 */
export function itemSize(item: AttributeMap): number {
  let total = 0

  for (const [name, value] of Object.entries(item)) {
    total += Buffer.byteLength(name, "utf8") + attributeSize(value)
  }

  return total
}

export function attributeSize(value: AttributeValue): number {
  if (value.S !== undefined) return Buffer.byteLength(value.S, "utf8")
  if (value.N !== undefined) return numberSize(value.N)
  if (value.B !== undefined) return value.B.byteLength
  if (value.BOOL !== undefined || value.NULL !== undefined) return 1
  if (value.SS !== undefined) return sum(value.SS.map((s) => Buffer.byteLength(s, "utf8")))
  if (value.NS !== undefined) return sum(value.NS.map(numberSize))
  if (value.BS !== undefined) return sum(value.BS.map((b) => b.byteLength))
  if (value.L !== undefined) return 3 + sum(value.L.map((v) => 1 + attributeSize(v)))
  if (value.M !== undefined) return 3 + Object.keys(value.M).length + itemSize(value.M)

  return 0
}

// one byte per two significant digits, plus one
function numberSize(text: string): number {
  const mantissa = text.replace(/^-/, "").replace(/[eE].*$/, "").replace(".", "")
  const significant = mantissa.replace(/^0+/, "").replace(/0+$/, "")

  return Math.ceil(Math.max(significant.length, 1) / 2) + 1
}

function sum(values: readonly number[]): number {
  return values.reduce((acc, v) => acc + v, 0)
}
