export { default } from './TaskCard';
export { aria } from './aria';
