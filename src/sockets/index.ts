/**
 * Socket handling for the static file server
 *
 * Exports bounded socket I/O, the per-connection handler and its dispatcher
 */

export { readBounded, writeAll } from "./boundedIO.ts";
export { ConnectionHandler } from "./ConnectionHandler.ts";
export { dispatchConnection, peerLabel, type DispatchOptions } from "./dispatch.ts";
