export { TRANSITIONS, canTransition, isTerminal, stateLabel, transition } from './state-machine';
