export { default } from './TodoEditButton';
