import type { CalcError, Result } from './types.js';

export const ok = <T>(value: T): Result<T> => ({ ok: true, value });

export const fail = <T>(error: CalcError): Result<T> => ({ ok: false, error });

const invalid = (quantity: 'distance' | 'time' | 'pace', input: string) =>
  `'${input}' is not a valid input for ${quantity}`;

export function invalidDistance(input: string): CalcError {
  return { kind: 'InvalidDistance', input, message: invalid('distance', input) };
}

export function invalidTime(input: string): CalcError {
  return { kind: 'InvalidTime', input, message: invalid('time', input) };
}

export function invalidPace(input: string): CalcError {
  return { kind: 'InvalidPace', input, message: invalid('pace', input) };
}

export function invalidArguments(supplied: number): CalcError {
  return {
    kind: 'InvalidArguments',
    supplied,
    message: `Exactly two of distance, time, and pace must be provided (got ${supplied})`
  };
}

export function divisionByZero(quantity: 'distance' | 'pace'): CalcError {
  return { kind: 'DivisionByZero', quantity, message: `${quantity} must be greater than zero` };
}
