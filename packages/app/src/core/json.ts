import { Match } from "effect"

// CHANGE: introduce the parsed value tree with member order kept by Map
// WHY: plain objects reorder integer-like keys, so object members live in a ReadonlyMap
// QUOTE(TZ): "Object member order is preserved as encountered"
// REF: req-json-tree-1
// SOURCE: n/a
// FORMAT THEOREM: ∀o ∈ JsonObject: keys(o) iterate in first-occurrence order
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: JsonValue is closed under array/object nesting with primitive leaves
// COMPLEXITY: O(1)/O(1)

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<JsonValue>
  | JsonObject

export type JsonObject = ReadonlyMap<string, JsonValue>

export type Json =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<Json>
  | { readonly [key: string]: Json }

export type JsonKind = "null" | "boolean" | "number" | "string" | "array" | "object"

export const isJsonArray = (value: JsonValue): value is ReadonlyArray<JsonValue> => Array.isArray(value)

export const isJsonObject = (value: JsonValue): value is JsonObject => value instanceof Map

export const describeKind = (value: JsonValue): JsonKind => {
  if (value === null) {
    return "null"
  }
  if (isJsonArray(value)) {
    return "array"
  }
  if (isJsonObject(value)) {
    return "object"
  }
  return Match.value(typeof value).pipe(
    Match.when("boolean", (): JsonKind => "boolean"),
    Match.when("number", (): JsonKind => "number"),
    Match.orElse((): JsonKind => "string")
  )
}

interface ArrayTask {
  readonly kind: "array"
  readonly items: ReadonlyArray<JsonValue>
  readonly out: Array<Json>
  index: number
}

interface ObjectTask {
  readonly kind: "object"
  readonly entries: ReadonlyArray<readonly [string, JsonValue]>
  readonly out: Array<[string, Json]>
  index: number
  key: string
}

type Task = ArrayTask | ObjectTask

type Step =
  | { readonly _tag: "Leaf"; readonly value: Json }
  | { readonly _tag: "Branch"; readonly task: Task }

const open = (value: JsonValue): Step => {
  if (isJsonArray(value)) {
    return { _tag: "Branch", task: { kind: "array", items: value, out: [], index: 0 } }
  }
  if (isJsonObject(value)) {
    return {
      _tag: "Branch",
      task: { kind: "object", entries: Array.from(value.entries()), out: [], index: 0, key: "" }
    }
  }
  return { _tag: "Leaf", value }
}

// undefined once every child of `task` has been taken
const nextChild = (task: Task): JsonValue | undefined => {
  if (task.kind === "array") {
    const item = task.items[task.index]
    task.index += 1
    return item
  }
  const entry = task.entries[task.index]
  if (entry === undefined) {
    return undefined
  }
  task.index += 1
  task.key = entry[0]
  return entry[1]
}

const store = (task: Task, value: Json): void => {
  if (task.kind === "array") {
    task.out.push(value)
  } else {
    task.out.push([task.key, value])
  }
}

const close = (task: Task): Json => task.kind === "array" ? task.out : Object.fromEntries(task.out)

/**
 * Convert a value tree into plain JS objects and arrays.
 *
 * @param value - Parsed value tree.
 * @returns Equivalent Json with object members as own properties.
 *
 * @pure true
 * @invariant "__proto__" members become own properties, never the prototype
 * @invariant depth is bounded by heap, as in parse
 * @complexity O(n) where n = number of nodes
 */
export const toPlainJson = (value: JsonValue): Json => {
  const first = open(value)
  if (first._tag === "Leaf") {
    return first.value
  }
  const stack: Array<Task> = [first.task]
  let result: Json = null
  for (let task = stack[stack.length - 1]; task !== undefined; task = stack[stack.length - 1]) {
    const child = nextChild(task)
    if (child === undefined) {
      stack.pop()
      const closed = close(task)
      const parent = stack[stack.length - 1]
      if (parent === undefined) {
        result = closed
      } else {
        store(parent, closed)
      }
      continue
    }
    const step = open(child)
    if (step._tag === "Leaf") {
      store(task, step.value)
    } else {
      stack.push(step.task)
    }
  }
  return result
}
