/**
 * Core Interfaces Module
 *
 * Contracts between the flows and their collaborators. Tests swap in fakes
 * for all three.
 *
 * @module
 */

export type { IPrompter } from "./IPrompter.js";

export type { IRemoteStore, ITaxonomyWriter, TaxonomyListing } from "./IRemoteStore.js";
export { isSuccessStatus } from "./IRemoteStore.js";

export type { IEditingSurface, EditOptions } from "./IEditingSurface.js";
