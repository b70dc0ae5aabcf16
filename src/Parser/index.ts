import { Effect, pipe, Stream } from "effect";
import { RESP, RespDecodeError } from "../RESP.js";

const toDecodeError = (e: unknown): RespDecodeError =>
  e instanceof RespDecodeError
    ? e
    : new RespDecodeError({ message: `Failed to decode RESP: ${String(e)}` });

/**
 * Decodes a raw byte stream into RESP values. Values may span chunk
 * boundaries; a stream that ends partway through a value fails with
 * `RespDecodeError`.
 */
export function decodeFromWireFormat<E, R>(
  input: Stream.Stream<Uint8Array, E, R>
): Stream.Stream<RESP.Value, E | RespDecodeError, R> {
  return Stream.suspend(() => {
    const decoder = new RESP.Decoder();
    return pipe(
      input,
      Stream.mapEffect((chunk) =>
        Effect.try({
          try: () => decoder.push(chunk),
          catch: toDecodeError,
        })
      ),
      Stream.flattenIterables,
      Stream.concat(
        Stream.execute(
          Effect.try({
            try: () => decoder.end(),
            catch: toDecodeError,
          })
        )
      )
    );
  });
}
