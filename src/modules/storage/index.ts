export * from './storage';
export * from './parseTasks';
