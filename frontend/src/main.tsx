import React from 'react';
import ReactDOM from 'react-dom/client';
import App from './App';
import './index.css';
import { TodoStoreProvider } from '@context';

ReactDOM.createRoot(document.getElementById('root') as HTMLElement).render(
  <React.StrictMode>
    <TodoStoreProvider>
      <App />
    </TodoStoreProvider>
  </React.StrictMode>
);
