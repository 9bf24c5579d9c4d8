import { BadRequestException, Logger } from '@nestjs/common';
import { ValidationError } from 'class-validator';

const logger = new Logger('RequestValidation');

/**
 * Flattens a class-validator error tree into one message per field location
 *
 * Nested objects and array items extend the location path, so a bad rate in
 * the second tariff of a list reads `At location 'body.tariffs.1.rate' ...`.
 */
export function formatValidationErrors(errors: ValidationError[], parentPath = 'body'): string[] {
  const messages: string[] = [];

  for (const error of errors) {
    const location = `${parentPath}.${error.property}`;

    for (const constraint of Object.values(error.constraints ?? {})) {
      messages.push(formatLocationMessage(location, constraint));
    }

    if (error.children && error.children.length > 0) {
      messages.push(...formatValidationErrors(error.children, location));
    }
  }

  return messages;
}

export function formatLocationMessage(location: string, message: string): string {
  const sentence = message.length > 0 ? `${message[0].toLowerCase()}${message.slice(1)}` : message;
  return `At location '${location}' ${sentence}`;
}

/**
 * Logs validation failures in detail and wraps them in a 400 response
 */
export function toValidationException(messages: string[]): BadRequestException {
  const noun = messages.length === 1 ? 'error' : 'errors';
  logger.error(
    `${messages.length} validation ${noun} in the recent request:\n  ${messages.join('\n  ')}`,
  );
  return new BadRequestException(messages);
}

/**
 * `exceptionFactory` for the global ValidationPipe
 */
export function validationExceptionFactory(errors: ValidationError[]): BadRequestException {
  return toValidationException(formatValidationErrors(errors));
}
