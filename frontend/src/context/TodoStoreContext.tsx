import { createContext, useContext, useState } from 'react';
import type { ReactNode } from 'react';
import { createTodoStore } from '@modules/store';
import type { TodoStore } from '@modules/store';

const TodoStoreContext = createContext<TodoStore | null>(null);

interface Props {
  children: ReactNode;
  store?: TodoStore;
}

export function TodoStoreProvider({ children, store }: Props) {
  // one store per provider unless the caller hands one in
  const [ownStore] = useState(() => store ?? createTodoStore());
  return (
    <TodoStoreContext.Provider value={store ?? ownStore}>
      {children}
    </TodoStoreContext.Provider>
  );
}

export function useTodoStore(): TodoStore {
  const store = useContext(TodoStoreContext);
  if (!store) {
    throw new Error('useTodoStore must be used within a TodoStoreProvider');
  }
  return store;
}
