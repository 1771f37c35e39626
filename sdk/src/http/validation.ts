/**
 * ELEVENLABS SDK - Validacao local de parametros
 *
 * Executada antes de qualquer chamada HTTP. Falhas lancam
 * MissingParameterError/ArgumentError e nunca tocam a rede.
 */

import { ArgumentError, MissingParameterError } from '../errors';

function isBlank(value: unknown): boolean {
  if (value === undefined || value === null) {
    return true;
  }
  if (typeof value === 'string') {
    return value.trim().length === 0;
  }
  return false;
}

/**
 * Exige valor presente; strings em branco contam como ausentes.
 * Booleanos `false` e o numero 0 sao aceitos.
 */
export function requireParam(name: string, value: unknown): void {
  if (isBlank(value)) {
    throw new MissingParameterError(name);
  }
}

/**
 * Valida varios parametros de uma vez, na ordem dada
 */
export function requireParams(params: Record<string, unknown>): void {
  for (const [name, value] of Object.entries(params)) {
    requireParam(name, value);
  }
}

export function requireNonEmptyArray(name: string, value: unknown): void {
  if (!Array.isArray(value) || value.length === 0) {
    throw new MissingParameterError(name, `${name} must be a non-empty array`);
  }
}

export function requireNonEmptyObject(name: string, value: unknown): void {
  requireParam(name, value);
  if (typeof value !== 'object' || value === null || Object.keys(value).length === 0) {
    throw new MissingParameterError(name, `${name} cannot be empty`);
  }
}

export function requireOneOf<T extends string>(name: string, value: string, allowed: readonly T[]): void {
  requireParam(name, value);
  if (!allowed.some(option => option === value)) {
    throw new ArgumentError(`${name} must be one of: ${allowed.join(', ')}`);
  }
}
