export const getUnixEpoch = (now: number = Date.now()) => Math.floor(now / 1000);
