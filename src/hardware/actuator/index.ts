export { ACTUATOR_MAX, ACTUATOR_MIN, commandActuator } from './actuator';
export type { ActuatorResult } from './actuator';
