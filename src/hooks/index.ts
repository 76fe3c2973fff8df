export { useTasks } from './tasks';
