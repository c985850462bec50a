export { default } from './TodoItemInput';
export { aria } from './aria';
