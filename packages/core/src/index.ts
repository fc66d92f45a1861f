export const name = '@specforge/core';

export * from './config/loader';
export * from './registry';
export * from './cost/metrics';
export * from './generation/types';
export * from './generation/completion';
export * from './generation/prompts';
export * from './generation/response-parser';
export * from './generation/manifest-planner';
export * from './generation/batch-grouper';
export * from './generation/batch-generator';
export * from './generation/gap-filler';
export * from './generation/iterate';
export * from './generation/file-writer';
export * from './generation/artifact-loader';
export * from './generation/session';
