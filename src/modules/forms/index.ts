export * from './taskForm';
