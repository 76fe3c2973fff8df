export { default } from './AboutDialog';
