/**
 * Storage module - The map-backed store behind both ledgers
 *
 * Hosts can supply their own store by implementing TransactionalLedgerStore.
 */

// Types
export type {
	LedgerSnapshot,
	LedgerStore,
	TransactionalLedgerStore,
} from "./types.js";

export { StorageError } from "./types.js";

// Reference implementations
export { MemoryLedgerStore } from "./memory-ledger-store.js";
