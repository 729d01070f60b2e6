import { Person } from '../model';
import { decodePerson, encodePerson } from './person';
import { dummyPerson } from '../../__testHelpers__/dummyPerson';

describe('person', () => {
  test('encode', () => {
    expect(encodePerson(dummyPerson())).toBe('Test Name <test@example.com> 2272247100 -0300');
  });

  test.each<[number, string]>([
    [0, '+0000'],
    [-330, '+0530'],
    [-60, '+0100'],
    [570, '-0930'],
  ])('offset %p is written as %p', (offset: number, expected: string) => {
    const person: Person = { name: 'n', email: 'e', date: { seconds: 10, offset } };
    expect(encodePerson(person)).toBe(`n <e> 10 ${expected}`);
    expect(decodePerson(encodePerson(person))).toEqual(person);
  });

  test('decode', () => {
    expect(decodePerson('Test Name <test@example.com> 2272247100 -0300')).toEqual(dummyPerson());
  });

  test('sanitizes name and email', () => {
    const person: Person = { name: ' <Evil>\nName ', email: 'a<b>@c', date: { seconds: 1, offset: 0 } };
    expect(encodePerson(person)).toBe('EvilName <ab@c> 1 +0000');
  });

  test.each([
    'Test Name test@example.com 2272247100 -0300',
    'Test Name <test@example.com> 2272247100',
    'Test Name <test@example.com> abc -0300',
    'Test Name <test@example.com> 2272247100 0300',
  ])('rejects %p', (value: string) => {
    expect(() => decodePerson(value)).toThrow('Improperly formatted person string');
  });
});
