export * from './todoStore';
export * from './errors';
