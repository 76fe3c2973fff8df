export { default } from './TaskFilters';
export { aria } from './aria';
