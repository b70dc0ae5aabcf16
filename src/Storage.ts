import { Context, type Effect } from "effect";
import type { RESP } from "./RESP.js";

export interface StorageImpl {
  /**
   * Runs one decoded request to completion. No other request observes the
   * store while it is in progress.
   */
  run(request: RESP.Value): Effect.Effect<RESP.Value>;
}

export class Storage extends Context.Tag("Storage")<Storage, StorageImpl>() {}
