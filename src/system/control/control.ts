/**
 * Control loop implementation
 *
 * One iteration, in order:
 * 1. Health check
 * 2. Injector tick
 * 3. At most one pending operator command
 * 4. Simulated subsystem calls
 * 5. Watchdog pet
 *
 * runLoop sleeps LOOP_PERIOD_MS between iterations. Quit is seen at the top
 * of the next iteration; a recovery in progress is awaited, not cut short.
 */

import { formatDebugReport } from '@features/debug-report';
import { pickFaultKind } from '@features/fault-injector';
import { checkLink } from '@hardware/link';
import { commandActuator } from '@hardware/actuator';
import { readSupplyVoltage } from '@hardware/power';
import { createSensorState, readSensor } from '@hardware/sensors';
import { drawInRange } from '@utils/number';

import { UNKNOWN_COMMAND_MESSAGE, parseCommand } from './helpers';
import type { Controller, LoopState, ParsedCommand } from './types';

/**
 * Initial loop state
 * @returns Running state with a fresh sensor
 */
export function createLoopState(): LoopState {
  return { running: true, iterations: 0, sensor: createSensorState() };
}

/**
 * Carry out one operator command
 *
 * @param controller - Loop dependencies
 * @param command - Parsed command
 * @returns False when the command asks the loop to stop
 */
export async function executeCommand(controller: Controller, command: ParsedCommand): Promise<boolean> {
  const monitor = controller.monitor;

  switch (command.kind) {
    case 'quit':
      monitor.log({ severity: 'info', errorKind: 'none', message: 'User requested system shutdown', func: 'executeCommand' });
      return false;
    case 'inject':
      monitor.injectFault(pickFaultKind(controller.random));
      return true;
    case 'recover':
      await monitor.attemptRecovery();
      return true;
    case 'debug':
      formatDebugReport(monitor.debugReport()).forEach(controller.print);
      return true;
    case 'unknown':
      controller.print(UNKNOWN_COMMAND_MESSAGE);
      return true;
  }
}

/**
 * Exercise the simulated subsystems and log what they report
 * @param controller - Loop dependencies
 * @param state - Current loop state
 * @returns Loop state with the updated sensor streak
 */
function runSubsystems(controller: Controller, state: LoopState): LoopState {
  const monitor = controller.monitor;

  const sensor = readSensor(state.sensor, controller.random, controller.config);
  if (sensor.event) monitor.log(sensor.event);

  const actuator = commandActuator(drawInRange(controller.random, 0, 100));
  if (actuator.event) monitor.log(actuator.event);

  checkLink();

  const power = readSupplyVoltage(controller.random, controller.config);
  if (power.event) monitor.log(power.event);

  return { ...state, sensor: sensor.state };
}

/**
 * Run one loop iteration (without the trailing sleep)
 *
 * @param controller - Loop dependencies
 * @param state - Current loop state
 * @returns Updated loop state
 */
export async function runCycle(controller: Controller, state: LoopState): Promise<LoopState> {
  const monitor = controller.monitor;

  monitor.checkHealth();
  monitor.tickInjector();

  let running = state.running;
  const input = controller.commands.poll();
  if (input !== null) {
    const command = parseCommand(input);
    if (command !== null) {
      running = await executeCommand(controller, command);
    }
  }

  const next = runSubsystems(controller, state);
  monitor.petWatchdog();

  return { ...next, running: running, iterations: state.iterations + 1 };
}

/**
 * Run until the operator quits
 *
 * @param controller - Loop dependencies
 * @param initial - Starting loop state
 * @returns Final loop state
 */
export async function runLoop(controller: Controller, initial: LoopState = createLoopState()): Promise<LoopState> {
  let state = initial;
  while (state.running) {
    state = await runCycle(controller, state);
    await controller.sleep(controller.config.LOOP_PERIOD_MS);
  }
  return state;
}
