export { SQLiteCoordinationStore } from "./sqlite-store.js";
export type { SQLiteStoreOptions } from "./sqlite-store.js";
