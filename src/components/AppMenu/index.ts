export { default } from './AppMenu';
export { aria } from './aria';
