export * from './gridDef';
