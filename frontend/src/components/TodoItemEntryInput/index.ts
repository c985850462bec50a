export { default } from './TodoItemEntryInput';
