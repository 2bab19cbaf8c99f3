/**
 * Editor Module
 */

export * from "./temp-buffer.js";
export * from "./impl/ExternalEditor.js";
