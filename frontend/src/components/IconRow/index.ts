export { default } from './IconRow';
export { aria } from './aria';
