export type {
  Bit,
  HierarchyNode,
  SignalChangeListener,
  SimulationEvents,
  TimeListener,
  TraceableSignal,
  Unsubscribe,
} from './types';

export { Logic, Const, toBits } from './Logic';
export type { LogicOptions, LogicValueInput } from './Logic';

export { Module } from './Module';
export type { ModuleOptions } from './Module';

export { Simulator } from './Simulator';
export type { SimulatorAction } from './Simulator';

export { sanitizeName, isReservedKeyword } from './sanitize';

export { logger } from './utils/logger';
export type { Logger } from './utils/logger';
