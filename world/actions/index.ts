export * from './types';
export { validateAction, applyAction, processAction } from './pipeline';
