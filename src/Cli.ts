import { Options } from "@effect/cli";
import * as Command from "@effect/cli/Command";
import * as NodeSocketServer from "@effect/experimental/SocketServer/Node";
import { Config, Effect, Layer, Logger, LogLevel, pipe, Schema } from "effect";
import { main } from "./main.js";
import * as InMemory from "./Storage/InMemory.js";

const logLevelSchema: Schema.Schema<LogLevel.Literal> = Schema.Literal(
  ...LogLevel.allLevels.map((level) => level._tag)
);

const logLevel = Options.text("logLevel").pipe(
  Options.withSchema(logLevelSchema),
  Options.withDefault("Info")
);

const port = Options.integer("port").pipe(
  Options.withFallbackConfig(Config.integer("PORT").pipe(Config.withDefault(6379)))
);

const host = Options.text("host").pipe(
  Options.withFallbackConfig(Config.string("HOST").pipe(Config.withDefault("0.0.0.0")))
);

const command = Command.make(
  "respkv",
  { logLevel, port, host },
  ({ logLevel, port, host }) =>
    pipe(
      main,
      Logger.withMinimumLogLevel(LogLevel.fromLiteral(logLevel)),
      Effect.provide(
        Layer.mergeAll(NodeSocketServer.layer({ port, host }), InMemory.layer())
      )
    )
);

export const run = Command.run(command, {
  name: "respkv",
  version: "0.1.0",
});
