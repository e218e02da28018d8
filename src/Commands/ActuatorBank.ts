import { logInfo } from '@utils/logger';
import type { ActuatorCommand } from './ActuatorCommand';

export type ActuatorChange = {
  device: string;
  command: ActuatorCommand;
  at: number;
};

export type ActuatorDriver = (device: string, command: ActuatorCommand) => void;

/**
 * Last commanded state per actuator (pump, valves, ...).
 *
 * The driver is where an output pin would be switched; the default only logs.
 */
export class ActuatorBank {
  private readonly states = new Map<string, ActuatorChange>();

  constructor(
    private readonly driver: ActuatorDriver = (device, command) =>
      logInfo(`[Actuators] ${device} -> ${command === 'on' ? 'ON' : 'OFF'}`),
    private readonly now: () => number = Date.now
  ) {}

  apply(device: string, command: ActuatorCommand): ActuatorChange {
    this.driver(device, command);
    const change = { device, command, at: this.now() };
    this.states.set(device, change);
    return change;
  }

  get(device: string): ActuatorCommand | undefined {
    return this.states.get(device)?.command;
  }

  snapshot(): Record<string, ActuatorCommand> {
    return Object.fromEntries([...this.states.values()].map(({ device, command }) => [device, command]));
  }
}
