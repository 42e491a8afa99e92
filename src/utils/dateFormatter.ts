/**
 * src/utils/dateFormatter.ts
 * Timestamp formatting for log output, using the configured timezone and pattern.
 */
import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import timezone from 'dayjs/plugin/timezone';
import { config } from '../config/server.config';

dayjs.extend(utc);
dayjs.extend(timezone);

/**
 * Formats a date or timestamp in the configured timezone.
 *
 * @param format - Optional dayjs pattern overriding `config.dateTime.format`
 */
export function formatDate(date: Date | string | number, format?: string): string {
  return dayjs(date)
    .tz(config.dateTime.timezone)
    .format(format ?? config.dateTime.format);
}

export function getCurrentFormattedDate(format?: string): string {
  return formatDate(new Date(), format);
}
