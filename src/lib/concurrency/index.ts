export { KeyedLock } from "./keyed-lock.js";
export { runPool, type PoolOptions, type PoolOutcome } from "./worker-pool.js";
