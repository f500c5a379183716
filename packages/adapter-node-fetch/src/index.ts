/**
 * @packageDocumentation
 * @module @relayline/adapter-node-fetch
 *
 * Relayline Node-Fetch Adapter Package
 *
 * Provides a node-fetch-based transport for relayline.
 */

export { default } from "./node-fetch-request-adapter";
export { default as NodeFetchRequestAdapter } from "./node-fetch-request-adapter";
export type { NodeFetchFunction } from "./node-fetch-request-adapter";
