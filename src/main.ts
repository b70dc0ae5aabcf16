import * as SocketServer from "@effect/experimental/SocketServer";
import { Socket } from "@effect/platform";
import type { SocketError } from "@effect/platform/Socket";
import { Channel, Effect, pipe, Schema, Stream } from "effect";
import type { ParseError } from "effect/ParseResult";
import { decodeFromWireFormat } from "./Parser/index.js";
import { RESP, type RespDecodeError } from "./RESP.js";
import { Storage } from "./Storage.js";

export type ServerError = SocketError | RespDecodeError | ParseError;
export type ServerServices = Storage;

export const main = Effect.gen(function* () {
  const server = yield* SocketServer.SocketServer;
  yield* Effect.logInfo(
    `Server started on ${
      server.address._tag === "TcpAddress"
        ? `${server.address.hostname}:${server.address.port}`
        : server.address.path
    }`
  );
  yield* server.run(handleConnection);
}).pipe(
  Effect.catchAll((e) => Effect.logError("Uncaught error", e)),
  Effect.catchAllDefect((e) => Effect.logFatal("Defect", e))
);

// a transport failure ends this connection only
const handleConnection = Effect.fn("handleConnection")(
  function* (socket: Socket.Socket) {
    yield* Effect.logInfo("New connection");
    const channel = Socket.toChannel<never>(socket);

    const rawInputStream = Stream.never.pipe(
      Stream.pipeThroughChannel(channel)
    );
    const rawOutputSink = Channel.toSink(channel);

    yield* pipe(rawInputStream, serve, Stream.run(rawOutputSink));
  },
  Effect.catchAll((e) => Effect.logWarning("Closing connection", e)),
  Effect.onExit(() => Effect.logInfo("Connection closed")),
  Effect.scoped
);

/**
 * Serves every request arriving on a byte stream, in order, producing the
 * encoded replies.
 */
export function serve<E, R>(
  input: Stream.Stream<Uint8Array, E, R>
): Stream.Stream<Uint8Array, E | ServerError, R | ServerServices> {
  return pipe(
    input,
    decodeFromWireFormat,
    Stream.tap((value) => Effect.logTrace("Received RESP: ", value)),
    processRESP,
    Stream.tap((value) => Effect.logTrace("Sending RESP: ", value)),
    encodeToWireFormat
  );
}

export function processRESP<E, R>(
  input: Stream.Stream<RESP.Value, E, R>
): Stream.Stream<RESP.Value, E, R | ServerServices> {
  return Stream.mapEffect(input, (request) =>
    Effect.flatMap(Storage, (storage) => storage.run(request))
  );
}

function encodeToWireFormat<E, R>(
  input: Stream.Stream<RESP.Value, E, R>
): Stream.Stream<Uint8Array, E | ParseError, R> {
  return pipe(
    input,
    Stream.mapEffect((respValue) =>
      Schema.encode(RESP.ValueWireFormat)(respValue)
    ),
    Stream.encodeText
  );
}
