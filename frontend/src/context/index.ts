export { TodoStoreProvider, useTodoStore } from './TodoStoreContext';
