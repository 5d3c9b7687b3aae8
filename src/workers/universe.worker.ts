/**
 * Universe Worker Entry Point
 *
 * Exposes UniverseApi via Comlink on `parentPort` so the relativistic
 * simulation runs off the main thread. The entry is TypeScript and imports
 * through the `~/` aliases, so the worker needs a loader that resolves both,
 * e.g. `new Worker(url, { execArgv: ["--import", "tsx"] })`. Wrap it with
 * `Comlink.wrap<UniverseApi>(nodeEndpoint(worker))`.
 */
import { parentPort } from "node:worker_threads";
import * as Comlink from "comlink";
import nodeEndpoint from "comlink/dist/umd/node-adapter.js";
import { assertInitialized } from "~/shared/validation";
import { createUniverseApi } from "./universe-api";

assertInitialized(parentPort, "parentPort", "universe.worker");

const api = createUniverseApi();
Comlink.expose(api, nodeEndpoint(parentPort));

// Tear the simulation down when the owning thread closes the port
parentPort.on("close", () => {
  api.dispose();
});
