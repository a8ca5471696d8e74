export { activateAlarm, isAlarmExpired, stepAlarmIntensity, INACTIVE_ALARM } from './alarm';
export type { AlarmRequest, ActiveAlarm, AlarmState } from './types';
