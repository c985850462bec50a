export { default } from './TodoScreen';
export { aria } from './aria';
