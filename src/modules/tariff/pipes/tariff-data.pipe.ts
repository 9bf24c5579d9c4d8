import { Injectable, PipeTransform } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { isCalendarDate } from '../../../utils/calendar-date';
import {
  formatLocationMessage,
  formatValidationErrors,
  toValidationException,
} from '../../../common/validation/validation-exception.factory';
import { PlainTariffDto } from '../dto/plain-tariff.dto';
import { TariffRecord } from '../interfaces/tariff.interface';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * "0 and 2", "0, 1 and 2"
 */
export function formatIndexes(indexes: number[]): string {
  if (indexes.length < 2) {
    return indexes.join('');
  }
  return `${indexes.slice(0, -1).join(', ')} and ${indexes[indexes.length - 1]}`;
}

/**
 * TariffDataPipe - validates the load payload and flattens it
 *
 * The body maps calendar dates to non-empty lists of `{cargo_type, rate}`,
 * each list naming a cargo type at most once. Every violation is collected
 * before the request is rejected.
 */
@Injectable()
export class TariffDataPipe implements PipeTransform<unknown, TariffRecord[]> {
  transform(value: unknown): TariffRecord[] {
    if (!isPlainObject(value)) {
      throw toValidationException([
        formatLocationMessage('body', 'Input should be an object mapping dates to lists of tariffs'),
      ]);
    }

    const messages: string[] = [];
    const tariffs: TariffRecord[] = [];

    for (const [date, entries] of Object.entries(value)) {
      const location = `body.${date}`;

      if (!isCalendarDate(date)) {
        messages.push(
          formatLocationMessage(location, `Key ${date} must be a valid calendar date in YYYY-MM-DD format`),
        );
      }

      if (!Array.isArray(entries)) {
        messages.push(formatLocationMessage(location, 'Input should be a list of tariffs'));
        continue;
      }
      if (entries.length === 0) {
        messages.push(formatLocationMessage(location, 'List should have at least 1 item'));
        continue;
      }

      const indexesByCargoType = new Map<string, number[]>();

      entries.forEach((entry: unknown, index: number) => {
        const entryLocation = `${location}.${index}`;
        if (!isPlainObject(entry)) {
          messages.push(formatLocationMessage(entryLocation, 'Input should be an object with cargo_type and rate'));
          return;
        }

        const dto = plainToInstance(PlainTariffDto, entry);
        const errors = validateSync(dto, { whitelist: true, forbidNonWhitelisted: true });
        if (errors.length > 0) {
          messages.push(...formatValidationErrors(errors, entryLocation));
          return;
        }

        const indexes = indexesByCargoType.get(dto.cargo_type) ?? [];
        indexes.push(index);
        indexesByCargoType.set(dto.cargo_type, indexes);

        tariffs.push({ date, cargo_type: dto.cargo_type, rate: dto.rate });
      });

      for (const [cargoType, indexes] of indexesByCargoType) {
        if (indexes.length > 1) {
          messages.push(
            formatLocationMessage(
              location,
              `tariffs at indexes ${formatIndexes(indexes)} share the same cargo type '${cargoType}'`,
            ),
          );
        }
      }
    }

    if (messages.length === 0 && tariffs.length === 0) {
      messages.push(formatLocationMessage('body', 'At least one tariff is required'));
    }

    if (messages.length > 0) {
      throw toValidationException(messages);
    }

    return tariffs;
  }
}
