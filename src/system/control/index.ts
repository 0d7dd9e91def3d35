export { createLoopState, executeCommand, runCycle, runLoop } from './control';
export { UNKNOWN_COMMAND_MESSAGE, createCommandQueue, parseCommand } from './helpers';
export type { CommandQueue, ControlConfig, Controller, LoopState, ParsedCommand } from './types';
