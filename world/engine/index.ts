export { World } from './world';
export type { WorldSnapshot, WorldOptions } from './world';
