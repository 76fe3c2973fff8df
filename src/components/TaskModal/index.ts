export { default } from './TaskModal';
