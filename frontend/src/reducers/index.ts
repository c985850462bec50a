export {
  todosReducer,
  initialState as todosInitialState,
  isBlank,
} from './todos';
export type { State as TodosState, Action as TodosAction } from './todos';
