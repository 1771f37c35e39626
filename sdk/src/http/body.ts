import { RequestBody } from '../types';

/**
 * Remove chaves com valor null/undefined do primeiro nivel.
 * `false`, `0` e '' sao valores presentes.
 */
export function compact<T extends object>(input: T): RequestBody {
  const output: RequestBody = {};
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined && value !== null) {
      output[key] = value;
    }
  }
  return output;
}
