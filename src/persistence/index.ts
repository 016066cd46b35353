export { FileAlertStore } from "./file-alert-store.js";
export type { FileAlertStoreConfig } from "./file-alert-store.js";
export { MemoryAlertStore } from "./memory-alert-store.js";
