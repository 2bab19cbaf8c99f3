/**
 * Store Module
 */

export * from "./impl/HttpRemoteStore.js";
