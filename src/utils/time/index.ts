export { now, nowMs } from './time';
export { parseDuration, formatHms, startOfNextDay } from './helpers';
