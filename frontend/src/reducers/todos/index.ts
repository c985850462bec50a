export * from './todosReducer';
