export * from './worldState';
