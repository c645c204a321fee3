/**
 * evm-invoke
 * Typed contract invocation and transaction lifecycle for Ethereum JSON-RPC nodes
 */

export * from './core/index.js';
export * from './protocol/index.js';
