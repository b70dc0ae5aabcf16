import { Schema } from "effect"
import { RESP } from "./RESP.js"
import { Store, Stored } from "./Store.js"

export const CommandName = Schema.Literal("PING", "SET", "GET", "HSET", "HGET", "HGETALL")
export type CommandName = Schema.Schema.Type<typeof CommandName>

const isCommandName = Schema.is(CommandName)

export const Errors = {
  invalidCommand: "Invalid command",
  syntax: "syntax error",
  notAMap: "Key exists but value is not a map",
  invalidField: "Invalid field type",
  invalidValue: "Invalid value type",
  wrongType: "WRONGTYPE Operation against a key holding the wrong kind of value",
  arity: (command: string) => `wrong number of arguments for '${command}' command`
} as const

const error = (value: string) => new RESP.Error({ value })
const arityError = (command: CommandName) => error(Errors.arity(command.toLowerCase()))

// simple and bulk strings are interchangeable as command arguments
const asString = (value: RESP.Value | undefined): string | undefined => {
  if (value === undefined) {
    return undefined
  }
  switch (value._tag) {
    case "SimpleString":
    case "BulkString":
      return value.value
    default:
      return undefined
  }
}

// elements include the command name, so arity checks count it too
type Handler = (elements: ReadonlyArray<RESP.Value>, store: Store) => RESP.Value

const PING: Handler = () => new RESP.SimpleString({ value: "PONG" })

const SET: Handler = (elements, store) => {
  if (elements.length > 3) {
    return error(Errors.syntax)
  }
  const key = asString(elements[1])
  const value = asString(elements[2])
  if (elements.length !== 3 || key === undefined || value === undefined) {
    return arityError("SET")
  }
  store.set(key, new Stored.String({ value }))
  return new RESP.SimpleString({ value: "OK" })
}

// a hash under the key reads as nil rather than WRONGTYPE
const GET: Handler = (elements, store) => {
  if (elements.length !== 2) {
    return arityError("GET")
  }
  const key = asString(elements[1])
  if (key === undefined) {
    return error(Errors.syntax)
  }
  const stored = store.get(key)
  if (stored?._tag === "String") {
    return new RESP.BulkString({ value: stored.value })
  }
  return new RESP.Null()
}

const HSET: Handler = (elements, store) => {
  if (elements.length < 4 || elements.length % 2 !== 0) {
    return arityError("HSET")
  }
  const key = asString(elements[1])
  if (key === undefined) {
    return arityError("HSET")
  }

  let hash: Map<string, string>
  const stored = store.get(key)
  if (stored === undefined) {
    hash = new Map()
    store.set(key, new Stored.Hash({ value: hash }))
  } else if (stored._tag === "Hash") {
    hash = stored.value
  } else {
    return error(Errors.notAMap)
  }

  // pairs written before a bad one stay written
  let created = 0
  for (let i = 2; i < elements.length; i += 2) {
    const field = asString(elements[i])
    if (field === undefined) {
      return error(Errors.invalidField)
    }
    const value = asString(elements[i + 1])
    if (value === undefined) {
      return error(Errors.invalidValue)
    }
    if (!hash.has(field)) {
      created++
    }
    hash.set(field, value)
  }
  return new RESP.Integer({ value: BigInt(created) })
}

const HGET: Handler = (elements, store) => {
  const key = asString(elements[1])
  const field = asString(elements[2])
  if (elements.length !== 3 || key === undefined || field === undefined) {
    return arityError("HGET")
  }
  const stored = store.get(key)
  if (stored === undefined) {
    return new RESP.Null()
  }
  if (stored._tag === "String") {
    return error(Errors.wrongType)
  }
  const value = stored.value.get(field)
  return value === undefined ? new RESP.Null() : new RESP.BulkString({ value })
}

const HGETALL: Handler = (elements, store) => {
  const key = asString(elements[1])
  if (elements.length < 2 || key === undefined) {
    return arityError("HGETALL")
  }
  const stored = store.get(key)
  if (stored?._tag !== "Hash") {
    return new RESP.Array({ value: [] })
  }
  return new RESP.Array({
    value: [...stored.value].flatMap(([field, value]) => [
      new RESP.BulkString({ value: field }),
      new RESP.BulkString({ value })
    ])
  })
}

const handlers: Record<CommandName, Handler> = { PING, SET, GET, HSET, HGET, HGETALL }

const toElements = (request: RESP.Value): ReadonlyArray<RESP.Value> | undefined => {
  switch (request._tag) {
    case "SimpleString":
    case "BulkString":
      return [request]
    case "Array":
      return asString(request.value[0]) === undefined ? undefined : request.value
    default:
      return undefined
  }
}

/**
 * Runs one decoded request against the store and returns the reply. Every
 * failure a client can cause comes back as an `Error` value; this never throws.
 */
export const handle = (request: RESP.Value, store: Store): RESP.Value => {
  const elements = toElements(request)
  const name = elements === undefined ? undefined : asString(elements[0])?.toUpperCase()
  if (elements === undefined || name === undefined || !isCommandName(name)) {
    return error(Errors.invalidCommand)
  }
  return handlers[name](elements, store)
}
