export * from './useTasks';
