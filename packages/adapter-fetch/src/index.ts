/**
 * @packageDocumentation
 * @module @relayline/adapter-fetch
 *
 * Relayline Fetch Adapter Package
 *
 * Provides a transport for relayline over the Fetch API built into Node.js.
 */

export { default } from "./fetch-request-adapter";
export { default as FetchRequestAdapter } from "./fetch-request-adapter";
export type { FetchFunction } from "./fetch-request-adapter";
