import { beforeEach, describe, expect, it } from "@effect/vitest";
import { Errors, handle } from "../src/Command.js";
import { RESP } from "../src/RESP.js";
import { Store, Stored } from "../src/Store.js";

const bulk = (value: string) => new RESP.BulkString({ value });
const int = (value: bigint) => new RESP.Integer({ value });
const error = (value: string) => new RESP.Error({ value });

const command = (...args: ReadonlyArray<string | RESP.Value>) =>
  new RESP.Array({
    value: args.map((arg) => (typeof arg === "string" ? bulk(arg) : arg)),
  });

const WRONGTYPE = "WRONGTYPE Operation against a key holding the wrong kind of value";

describe("Command", () => {
  let store: Store;

  beforeEach(() => {
    store = new Store();
  });

  describe("dispatch", () => {
    it("should match command names case-insensitively", () => {
      const pong = new RESP.SimpleString({ value: "PONG" });
      expect(handle(command("PING"), store)).toEqual(pong);
      expect(handle(command("ping"), store)).toEqual(pong);
      expect(handle(command(new RESP.SimpleString({ value: "PiNg" })), store)).toEqual(pong);
    });

    it("should accept a bare string as a command without arguments", () => {
      expect(handle(bulk("ping"), store)).toEqual(new RESP.SimpleString({ value: "PONG" }));
      expect(handle(new RESP.SimpleString({ value: "GET" }), store)).toEqual(
        error("wrong number of arguments for 'get' command")
      );
    });

    it("should reject unknown commands in any casing", () => {
      for (const name of ["FOO", "foo", "Del", "PINGX"]) {
        expect(handle(command(name), store)).toEqual(error("Invalid command"));
      }
    });

    it("should reject requests that do not name a command", () => {
      expect(handle(int(1n), store)).toEqual(error("Invalid command"));
      expect(handle(new RESP.Null(), store)).toEqual(error("Invalid command"));
      expect(handle(new RESP.Array({ value: [] }), store)).toEqual(error("Invalid command"));
      expect(handle(command(int(1n), "k"), store)).toEqual(error("Invalid command"));
    });

    it("should ignore PING arguments", () => {
      expect(handle(command("PING", "hello", int(3n)), store)).toEqual(
        new RESP.SimpleString({ value: "PONG" })
      );
    });
  });

  describe("SET / GET", () => {
    it("should read back what was set", () => {
      expect(handle(command("SET", "key", "value"), store)).toEqual(
        new RESP.SimpleString({ value: "OK" })
      );
      expect(handle(command("GET", "key"), store)).toEqual(bulk("value"));
    });

    it("should return null for a key that was never set", () => {
      expect(handle(command("GET", "missing"), store)).toEqual(new RESP.Null());
    });

    it("should keep the extra-argument and missing-argument errors distinct", () => {
      expect(handle(command("SET", "k", "v", "extra"), store)).toEqual(error("syntax error"));
      expect(handle(command("SET", "k"), store)).toEqual(
        error("wrong number of arguments for 'set' command")
      );
      expect(RESP.encode(handle(command("SET", "k", "v", "extra"), store))).toEqual(
        "-ERR syntax error\r\n"
      );
    });

    it("should reject non-string SET arguments as an arity error", () => {
      expect(handle(command("SET", "k", int(1n)), store)).toEqual(
        error("wrong number of arguments for 'set' command")
      );
      expect(store.has("k")).toBe(false);
    });

    it("should check GET arity before the key type", () => {
      expect(handle(command("GET"), store)).toEqual(
        error("wrong number of arguments for 'get' command")
      );
      expect(handle(command("GET", "a", "b"), store)).toEqual(
        error("wrong number of arguments for 'get' command")
      );
      expect(handle(command("GET", int(1n)), store)).toEqual(error("syntax error"));
    });

    it("should overwrite a hash with a string", () => {
      handle(command("HSET", "h", "f", "v"), store);
      expect(handle(command("SET", "h", "s"), store)).toEqual(
        new RESP.SimpleString({ value: "OK" })
      );
      expect(handle(command("GET", "h"), store)).toEqual(bulk("s"));
    });

    it("should read a hash key as null", () => {
      handle(command("HSET", "h", "f", "v"), store);
      expect(handle(command("GET", "h"), store)).toEqual(new RESP.Null());
    });
  });

  describe("HSET / HGET", () => {
    it("should count only new fields and keep the last write", () => {
      expect(handle(command("HSET", "h", "f1", "v1"), store)).toEqual(int(1n));
      expect(handle(command("HSET", "h", "f1", "v2"), store)).toEqual(int(0n));
      expect(handle(command("HGET", "h", "f1"), store)).toEqual(bulk("v2"));
    });

    it("should set several pairs at once", () => {
      expect(handle(command("HSET", "h", "f1", "v1", "f2", "v2"), store)).toEqual(int(2n));
      expect(handle(command("HSET", "h", "f2", "x", "f3", "y"), store)).toEqual(int(1n));
    });

    it("should count a field repeated within one call once", () => {
      expect(handle(command("HSET", "h", "f", "a", "f", "b"), store)).toEqual(int(1n));
      expect(handle(command("HGET", "h", "f"), store)).toEqual(bulk("b"));
    });

    it("should reject a wrong number of arguments", () => {
      const arity = error("wrong number of arguments for 'hset' command");
      expect(handle(command("HSET", "h", "f"), store)).toEqual(arity);
      expect(handle(command("HSET", "h", "f1", "v1", "f2"), store)).toEqual(arity);
      expect(handle(command("HSET", int(1n), "f", "v"), store)).toEqual(arity);
      expect(store.size).toEqual(0);
    });

    it("should refuse to write into a string key", () => {
      handle(command("SET", "s", "text"), store);
      expect(handle(command("HSET", "s", "f", "v"), store)).toEqual(
        error(Errors.notAMap)
      );
      expect(handle(command("GET", "s"), store)).toEqual(bulk("text"));
    });

    it("should keep pairs written before a bad field", () => {
      expect(handle(command("HSET", "h", "f1", "v1", int(2n), "v2"), store)).toEqual(
        error("Invalid field type")
      );
      expect(handle(command("HGET", "h", "f1"), store)).toEqual(bulk("v1"));
    });

    it("should leave the created hash in place after a bad value", () => {
      expect(handle(command("HSET", "h", "f1", int(1n)), store)).toEqual(
        error("Invalid value type")
      );
      const stored = store.get("h");
      expect(stored).toBeInstanceOf(Stored.Hash);
      expect(stored?.value).toEqual(new Map());
      expect(handle(command("HGETALL", "h"), store)).toEqual(new RESP.Array({ value: [] }));
    });

    it("should look up fields", () => {
      handle(command("HSET", "h", "f", "v"), store);
      handle(command("SET", "s", "text"), store);

      expect(handle(command("HGET", "missing", "f"), store)).toEqual(new RESP.Null());
      expect(handle(command("HGET", "h", "other"), store)).toEqual(new RESP.Null());
      expect(handle(command("HGET", "s", "f"), store)).toEqual(error(WRONGTYPE));
      expect(RESP.encode(handle(command("HGET", "s", "f"), store))).toEqual(
        `-ERR ${WRONGTYPE}\r\n`
      );
    });

    it("should reject a wrong HGET shape", () => {
      const arity = error("wrong number of arguments for 'hget' command");
      expect(handle(command("HGET", "h"), store)).toEqual(arity);
      expect(handle(command("HGET", "h", "f", "g"), store)).toEqual(arity);
      expect(handle(command("HGET", "h", int(1n)), store)).toEqual(arity);
    });
  });

  describe("HGETALL", () => {
    it("should list every field and value", () => {
      handle(command("HSET", "h", "f1", "v1", "f2", "v2"), store);
      expect(handle(command("HGETALL", "h"), store)).toEqual(
        new RESP.Array({ value: [bulk("f1"), bulk("v1"), bulk("f2"), bulk("v2")] })
      );
    });

    it("should return an empty array for a missing or string key", () => {
      handle(command("SET", "s", "text"), store);
      expect(handle(command("HGETALL", "missing"), store)).toEqual(
        new RESP.Array({ value: [] })
      );
      expect(handle(command("HGETALL", "s"), store)).toEqual(new RESP.Array({ value: [] }));
    });

    it("should reject a missing key", () => {
      const arity = error("wrong number of arguments for 'hgetall' command");
      expect(handle(command("HGETALL"), store)).toEqual(arity);
      expect(handle(command("HGETALL", new RESP.Null()), store)).toEqual(arity);
    });
  });
});
