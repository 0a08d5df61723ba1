export { SimulationLoop } from './SimulationLoop';
export type { SimulationLoopConfig } from './SimulationLoop';
