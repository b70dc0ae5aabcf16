import { Data, Effect, ParseResult, Schema } from "effect"

export class RespDecodeError extends Data.TaggedError("RespDecodeError")<{
  readonly message: string
}> {}

const CR = 13
const LF = 10

// same ceilings redis applies to incoming requests
const MAX_BULK_LENGTH = 512n * 1024n * 1024n
const MAX_ARRAY_LENGTH = 1024n * 1024n
// headers and inline lines, as redis caps inline requests
const MAX_LINE_LENGTH = 64 * 1024

const I64_MIN = -9223372036854775808n
const I64_MAX = 9223372036854775807n

const lineTooLong = () =>
  new RespDecodeError({ message: `Line exceeds ${MAX_LINE_LENGTH} bytes` })

const textEncoder = new TextEncoder()
const textDecoder = new TextDecoder()

export namespace RESP {
  export class SimpleString extends Schema.TaggedClass<SimpleString>("SimpleString")("SimpleString", {
    value: Schema.String
  }) {}

  export class Error extends Schema.TaggedClass<Error>("Error")("Error", {
    value: Schema.String
  }) {}

  export class Integer extends Schema.TaggedClass<Integer>("Integer")("Integer", {
    value: Schema.BigIntFromSelf
  }) {}

  export class BulkString extends Schema.TaggedClass<BulkString>("BulkString")("BulkString", {
    value: Schema.String
  }) {}

  export class Null extends Schema.TaggedClass<Null>("Null")("Null", {}) {}

  export interface ArrayEncoded {
    readonly _tag: "Array"
    readonly value: ReadonlyArray<ValueEncoded>
  }

  export type ValueEncoded =
    | typeof SimpleString.Encoded
    | typeof Error.Encoded
    | typeof Integer.Encoded
    | typeof BulkString.Encoded
    | typeof Null.Encoded
    | ArrayEncoded

  export class Array extends Schema.TaggedClass<Array>("Array")("Array", {
    value: Schema.Array(Schema.suspend((): Schema.Schema<Value, ValueEncoded> => Value))
  }) {}

  export type Value = SimpleString | Error | Integer | BulkString | Array | Null

  export const Value = Schema.Union(SimpleString, Error, Integer, BulkString, Array, Null)

  /**
   * Serializes a value to its wire form. Bulk string lengths are counted in
   * UTF-8 bytes, and error replies always carry the `ERR ` tag.
   */
  export const encode = (value: Value): string => {
    switch (value._tag) {
      case "SimpleString":
        return `+${value.value}\r\n`
      case "Error":
        return `-ERR ${value.value}\r\n`
      case "Integer":
        return `:${value.value.toString()}\r\n`
      case "BulkString":
        return `$${textEncoder.encode(value.value).byteLength}\r\n${value.value}\r\n`
      case "Array":
        return `*${value.value.length}\r\n${value.value.map(encode).join("")}`
      case "Null":
        return "$-1\r\n"
    }
  }

  const parseInteger = (text: string): bigint => {
    const trimmed = text.trim()
    if (!/^[+-]?\d+$/.test(trimmed)) {
      throw new RespDecodeError({ message: `Expected integer, got "${text}"` })
    }
    const n = BigInt(trimmed)
    if (n < I64_MIN || n > I64_MAX) {
      throw new RespDecodeError({ message: `Integer out of range: ${trimmed}` })
    }
    return n
  }

  // an array whose header has been read but whose elements are still arriving
  interface Frame {
    readonly length: number
    readonly items: globalThis.Array<Value>
  }

  /**
   * Incremental decoder for a byte stream. Decoding resumes where the previous
   * `push` stopped: open arrays, a pending bulk payload and the scanned part
   * of an unterminated line are all kept, so no byte is parsed twice.
   *
   * Lines are trimmed before their type tag is read. An unrecognised tag is
   * not a failure: it decodes to an `Error` value. Malformed input throws
   * `RespDecodeError`.
   */
  export class Decoder {
    private buffer = new Uint8Array(0)
    private start = 0
    private tail = 0
    // where the search for the next CRLF resumes
    private scanned = 0
    private bulkLength: number | undefined = undefined
    private readonly frames: globalThis.Array<Frame> = []

    push(chunk: Uint8Array): ReadonlyArray<Value> {
      this.append(chunk)
      const values: globalThis.Array<Value> = []
      for (;;) {
        if (!this.step(values)) {
          return values
        }
      }
    }

    end(): void {
      if (this.tail > this.start || this.bulkLength !== undefined || this.frames.length > 0) {
        throw new RespDecodeError({ message: "Unexpected end of stream" })
      }
    }

    // chunks are copied: the producer may reuse its buffer
    private append(chunk: Uint8Array): void {
      if (this.tail + chunk.length > this.buffer.length) {
        const live = this.tail - this.start
        const size = live + chunk.length
        if (size * 2 <= this.buffer.length) {
          this.buffer.copyWithin(0, this.start, this.tail)
        } else {
          const grown = new Uint8Array(Math.max(size * 2, 4096))
          grown.set(this.buffer.subarray(this.start, this.tail))
          this.buffer = grown
        }
        this.scanned -= this.start
        this.start = 0
        this.tail = live
      }
      this.buffer.set(chunk, this.tail)
      this.tail += chunk.length
    }

    private consume(offset: number): void {
      this.start = offset
      this.scanned = offset
    }

    // returns false once the buffered bytes are exhausted
    private step(out: globalThis.Array<Value>): boolean {
      if (this.bulkLength !== undefined) {
        const payloadEnd = this.start + this.bulkLength
        if (payloadEnd + 2 > this.tail) {
          return false
        }
        if (this.buffer[payloadEnd] !== CR || this.buffer[payloadEnd + 1] !== LF) {
          throw new RespDecodeError({
            message: `Bulk string is longer than its declared length ${this.bulkLength}`
          })
        }
        const value = textDecoder.decode(this.buffer.subarray(this.start, payloadEnd))
        this.bulkLength = undefined
        this.consume(payloadEnd + 2)
        this.emit(new BulkString({ value }), out)
        return true
      }

      const line = this.readLine()
      if (line === undefined) {
        return false
      }
      const value = this.readHeader(line.trim())
      if (value !== undefined) {
        this.emit(value, out)
      }
      return true
    }

    private readLine(): string | undefined {
      for (let i = this.scanned; i + 1 < this.tail; i++) {
        if (this.buffer[i] === CR && this.buffer[i + 1] === LF) {
          if (i - this.start > MAX_LINE_LENGTH) {
            throw lineTooLong()
          }
          const line = textDecoder.decode(this.buffer.subarray(this.start, i))
          this.consume(i + 2)
          return line
        }
      }
      // the last byte may be a CR whose LF has not arrived
      this.scanned = Math.max(this.start, this.tail - 1)
      if (this.scanned - this.start > MAX_LINE_LENGTH) {
        throw lineTooLong()
      }
      return undefined
    }

    // returns undefined when the line opens an array or a bulk payload
    private readHeader(line: string): Value | undefined {
      const rest = line.slice(1)
      switch (line.charAt(0)) {
        case "+":
          return new SimpleString({ value: rest })
        case "-":
          return new Error({ value: rest })
        case ":":
          return new Integer({ value: parseInteger(rest) })
        case "$": {
          const length = parseInteger(rest)
          if (length === -1n) {
            return new Null()
          }
          if (length < 0n || length > MAX_BULK_LENGTH) {
            throw new RespDecodeError({ message: `Invalid bulk string length: ${length}` })
          }
          this.bulkLength = Number(length)
          return undefined
        }
        case "*": {
          const count = parseInteger(rest)
          if (count < 0n || count > MAX_ARRAY_LENGTH) {
            throw new RespDecodeError({ message: `Invalid array length: ${count}` })
          }
          if (count === 0n) {
            return new Array({ value: [] })
          }
          this.frames.push({ length: Number(count), items: [] })
          return undefined
        }
        default:
          return new Error({ value: "Unknown error" })
      }
    }

    // completes every enclosing array the value fills up
    private emit(value: Value, out: globalThis.Array<Value>): void {
      let current = value
      for (;;) {
        const frame = this.frames[this.frames.length - 1]
        if (frame === undefined) {
          out.push(current)
          return
        }
        frame.items.push(current)
        if (frame.items.length < frame.length) {
          return
        }
        this.frames.pop()
        current = new Array({ value: frame.items })
      }
    }
  }

  export const ValueWireFormat: Schema.Schema<Value, string> = Schema.transformOrFail(
    Schema.String,
    Schema.typeSchema(Value),
    {
      strict: true,
      decode: (s, _, ast) =>
        Effect.gen(function*() {
          const decoder = new Decoder()
          const values = yield* Effect.try({
            try: () => {
              const values = decoder.push(textEncoder.encode(s))
              decoder.end()
              return values
            },
            catch: (e) => new ParseResult.Type(ast, s, e instanceof RespDecodeError ? e.message : "Malformed RESP")
          })
          const [value, ...rest] = values
          if (value === undefined || rest.length > 0) {
            return yield* Effect.fail(new ParseResult.Type(ast, s, "Expected exactly one RESP value"))
          }
          return value
        }),
      encode: (value) => ParseResult.succeed(encode(value))
    }
  )
}
