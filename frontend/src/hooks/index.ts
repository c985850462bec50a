export { useTodos } from './todos/useTodos';
