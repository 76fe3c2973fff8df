export { default } from './SearchBar';
export { aria } from './aria';
