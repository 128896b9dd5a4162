import { StaffedHours } from '../config/types';

export function hourInTimeZone(date: Date, timeZone: string): number {
  const hour = new Intl.DateTimeFormat('en-GB', { timeZone, hour: '2-digit', hourCycle: 'h23' })
    .formatToParts(date)
    .find((p) => p.type === 'hour');
  return Number(hour?.value ?? '0');
}

/** Both ends of the window are inclusive hours */
export function isStaffedHour(date: Date, hours: StaffedHours): boolean {
  const hour = hourInTimeZone(date, hours.timeZone);
  return hour >= hours.startHour && hour <= hours.endHour;
}
