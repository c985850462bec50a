export { default } from './TodoRow';
export { aria } from './aria';
