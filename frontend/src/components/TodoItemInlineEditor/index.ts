export { default } from './TodoItemInlineEditor';
export { aria } from './aria';
