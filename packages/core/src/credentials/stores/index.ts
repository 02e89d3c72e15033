/**
 * Secondary credential store backends
 *
 * @module credentials/stores
 */

export type { SecondaryStore } from "../types.js";
export { EncryptedFileStore, type EncryptedFileStoreOptions } from "./encrypted-file-store.js";
