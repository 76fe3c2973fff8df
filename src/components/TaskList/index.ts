export { default } from './TaskList';
export { aria } from './aria';
