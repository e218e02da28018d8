export type ActuatorCommand = 'on' | 'off';

/**
 * Map a command payload to a command. Tokens are compared case-sensitively; anything that is not
 * exactly `LIGAR` or `DESLIGAR` yields `undefined`.
 */
export const parseActuatorCommand = (payload: string): ActuatorCommand | undefined => {
  switch (payload) {
    case 'LIGAR':
      return 'on';
    case 'DESLIGAR':
      return 'off';
    default:
      return undefined;
  }
};
