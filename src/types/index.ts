// Action metadata types
export * from './metadata.types';

// Common types
export * from './common.types';

// Commit analyzer types
export * from './commit-analyzer.types';

// Changelog types
export * from './changelog.types';

// Configuration types
export * from './config.types';

// Context and runtime types
export * from './context.types';

// GitHub related types
export * from './github.types';

// Node:child_process types
export * from './node-child-process.types';
