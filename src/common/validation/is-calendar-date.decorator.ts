import { ValidateBy, ValidationOptions, buildMessage } from 'class-validator';
import { isCalendarDate } from '../../utils/calendar-date';

export const IS_CALENDAR_DATE = 'isCalendarDate';

/**
 * Checks that the value is an ISO `YYYY-MM-DD` string naming an existing day
 */
export function IsCalendarDate(validationOptions?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: IS_CALENDAR_DATE,
      validator: {
        validate: (value: unknown): boolean => isCalendarDate(value),
        defaultMessage: buildMessage(
          eachPrefix => `${eachPrefix}$property must be a valid calendar date in YYYY-MM-DD format`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}
