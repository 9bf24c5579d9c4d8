import { ArgumentMetadata, Injectable, PipeTransform } from '@nestjs/common';
import { isCalendarDate } from '../../utils/calendar-date';
import { formatLocationMessage, toValidationException } from './validation-exception.factory';

/**
 * Accepts route and query parameters holding a `YYYY-MM-DD` calendar date
 */
@Injectable()
export class CalendarDatePipe implements PipeTransform<unknown, string> {
  transform(value: unknown, metadata: ArgumentMetadata): string {
    if (isCalendarDate(value)) {
      return value;
    }

    const source = metadata.type === 'param' ? 'path' : metadata.type;
    const name = metadata.data ?? 'value';
    throw toValidationException([
      formatLocationMessage(`${source}.${name}`, `${name} must be a valid calendar date in YYYY-MM-DD format`),
    ]);
  }
}
