/**
 * Orchestration module - wires catalog, decisions, kitchen and core into
 * a run registry
 */

export type { Kitchen, KitchenOverrides } from './kitchen-factory';
export {
  createKitchen,
  createLoggerForConfig,
  createTestConfig,
  createTestKitchen,
} from './kitchen-factory';
