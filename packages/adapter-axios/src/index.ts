/**
 * @packageDocumentation
 * @module @relayline/adapter-axios
 *
 * Relayline Axios Adapter Package
 *
 * Provides an Axios-based transport for relayline.
 */

export { default } from "./axios-request-adapter";
export { default as AxiosRequestAdapter } from "./axios-request-adapter";
