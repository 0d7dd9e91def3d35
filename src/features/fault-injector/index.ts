export { activateFault, createInjectorState, deactivateFault, tickInjector } from './fault-injector';
export { emissionFor, pickFaultKind, validateInjectorConfig } from './helpers';
export type { InjectorConfig, InjectorState, InjectorTickResult } from './types';
