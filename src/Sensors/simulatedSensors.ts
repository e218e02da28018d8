import type { SensorReading, TelemetrySample } from './samples';

type Random = () => number;

/** Uniform integer in [0, n). */
const randomInt = (random: Random, n: number) => Math.floor(random() * n);

/**
 * Stand-ins for the field sensors. Ranges match the hardware the device normally carries:
 * 20.0–29.9 °C and 30.0–79.9 % for the climate sensor, 0–10 for the light sensor, −3–45 °C for the
 * outdoor thermometer.
 */
export const createSimulatedTelemetry = (random: Random = Math.random, now: () => number = Date.now) => {
  let counter = 0;
  return (): TelemetrySample => ({
    temperature: 20 + randomInt(random, 100) / 10,
    humidity: 30 + randomInt(random, 500) / 10,
    counter: counter++,
    timestamp: now(),
  });
};

export const createSimulatedLuminosity =
  (random: Random = Math.random, now: () => number = Date.now) =>
  (): SensorReading => ({ value: randomInt(random, 11), timestamp: now() });

export const createSimulatedOutdoorTemperature =
  (random: Random = Math.random, now: () => number = Date.now) =>
  (): SensorReading => ({ value: randomInt(random, 49) - 3, timestamp: now() });
