export type TelemetrySample = {
  temperature: number;
  humidity: number;
  /** Increments once per sample taken. */
  counter: number;
  timestamp: number;
};

export type HealthSample = {
  freeHeap: number;
  minFreeHeap: number;
  /** dBm, or null when the host has no radio to ask. */
  signalStrength: number | null;
  uptimeSec: number;
  connected: boolean;
  timestamp: number;
};

export type SensorReading = {
  value: number;
  timestamp: number;
};
