export * from './kernel-core/Errors.js';
export * from './kernel-core/L0/Ontology.js';
export * from './kernel-core/L0/Crypto.js';
export * from './kernel-core/L0/Codec.js';
export * from './kernel-core/L0/Primitives.js';
export * from './kernel-core/L0/Guards.js';
export * from './kernel-core/L0/Invariants.js';
export * from './kernel-core/L1/Identity.js';
export * from './kernel-core/L1/CommandFactory.js';
export * from './kernel-core/L2/State.js';
export * from './kernel-core/L3/Entropy.js';
export * from './kernel-core/L3/Genetics.js';
export * from './kernel-core/L4/Market.js';
export * from './kernel-core/L5/Audit.js';
export * from './kernel-core/Kernel.js';

export * from './Platform/Config.js';
export * from './Platform/Errors.js';
export { MemoryStateRepository, MemoryReplayStore } from './Platform/Ports.js';
export type { IStateRepository, IReplayStore } from './Platform/Ports.js';
export * from './Platform/KernelPlatform.js';

export * from './infrastructure/persistence/SQLiteStateRepository.js';
export * from './infrastructure/persistence/SQLiteEventStore.js';
export * from './infrastructure/persistence/SQLiteReplayStore.js';
export { createApp, statusOf, RegistryServer } from './server/Server.js';
