import { randomUUID } from 'crypto';

export const generateId = () => randomUUID();

export const now = () => Date.now();

export const maxOf = (values: Iterable<number>, fallback: number) => {
  let result = fallback;
  for (const value of values) {
    if (value > result) result = value;
  }
  return result;
};
