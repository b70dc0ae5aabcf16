import { Effect, Layer } from "effect"
import { handle } from "../Command.js"
import { Storage } from "../Storage.js"
import { Store } from "../Store.js"

// connections are served concurrently, so every command takes the one permit
export const layer = (store: Store = new Store()) =>
  Layer.effect(
    Storage,
    Effect.gen(function*() {
      const lock = yield* Effect.makeSemaphore(1)
      return Storage.of({
        run: (request) =>
          Effect.logTrace("Storage running command: ", request).pipe(
            Effect.zipRight(Effect.sync(() => handle(request, store))),
            lock.withPermits(1)
          )
      })
    })
  )
