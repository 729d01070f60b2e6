import { Person, SecondsWithOffset } from '../model';
import { sanitizeString } from './util';

const personRegex = /^([^<]*) <([^>]*)> (\d+) ([+-])(\d\d)(\d\d)$/;

export function decodePerson(value: string): Person {
  const match = value.match(personRegex);
  if (!match) {
    throw new SyntaxError(`Improperly formatted person string '${value}'`);
  }

  const [, name, email, seconds, sign, hours, minutes] = match;
  const offset = parseInt(hours, 10) * 60 + parseInt(minutes, 10);
  return {
    name,
    email,
    date: {
      seconds: parseInt(seconds, 10),
      // Ahead of UTC is a negative offset
      offset: offset === 0 ? 0 : sign === '+' ? -offset : offset,
    },
  };
}

export function encodePerson(person: Person): string {
  return `${sanitizeString(person.name)} <${sanitizeString(person.email)}> ${formatDate(person.date)}`;
}

function formatDate({ seconds, offset }: SecondsWithOffset): string {
  const sign = offset <= 0 ? '+' : '-';
  const minutes = Math.abs(offset);
  return `${Math.floor(seconds)} ${sign}${two(Math.floor(minutes / 60))}${two(minutes % 60)}`;
}

function two(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * Describes the current time in the local timezone.
 */
export function now(): SecondsWithOffset {
  const date = new Date();
  return {
    seconds: Math.floor(date.getTime() / 1000),
    offset: date.getTimezoneOffset(),
  };
}
