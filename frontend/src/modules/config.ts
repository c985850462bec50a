export const config = {
  debugStore: import.meta.env.VITE_DEBUG_STORE === 'true',
} as const;
