// Blog Agent Nodes

// Cycle-level nodes
export * from './fetch-node';
export * from './topic-node';
export * from './cleanup-node';

// Per-topic nodes
export * from './filter-node';
export * from './image-node';
export * from './research-node';
export * from './content-node';
export * from './render-node';
export * from './publish-node';
