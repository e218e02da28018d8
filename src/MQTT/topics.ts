export type Topics = {
  /** Retained `ONLINE`/`OFFLINE`; also the default last-will topic. */
  status: string;
  telemetry: string;
  health: string;
  /** Parent of `<commands>/<device>` actuator sub-paths. */
  commands: string;
  config: string;
  boot: string;
  alerts: string;
  custom: string;
  sensor: (name: string) => string;
};

export const STATUS_ONLINE = 'ONLINE';
export const STATUS_OFFLINE = 'OFFLINE';

export const buildTopics = (base: string): Topics => ({
  status: `${base}/status`,
  telemetry: `${base}/telemetry`,
  health: `${base}/health`,
  commands: `${base}/commands`,
  config: `${base}/config`,
  boot: `${base}/boot`,
  alerts: `${base}/alerts`,
  custom: `${base}/custom`,
  sensor: (name: string) => `${base}/sensors/${name}`,
});
