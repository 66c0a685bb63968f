import type { ITelescopeSession } from '../../domain/ports/ITelescopeSession.js';
import { InvalidInputError, NotConnectedError } from '../../domain/errors/TelescopeErrors.js';

export function assertConnected(session: ITelescopeSession, operation: string): void {
  const state = session.connectionState;
  if (state !== 'connected' && state !== 'degraded') {
    throw new NotConnectedError(state, operation);
  }
}

export interface RangeRule {
  min: number;
  max?: number;
  integer?: boolean;
  exclusiveMin?: boolean;
  exclusiveMax?: boolean;
}

/**
 * e.g. "gain must be an integer at least 0 and at most 300"
 */
export function assertInRange(field: string, value: number, rule: RangeRule): void {
  const max = rule.max ?? Number.POSITIVE_INFINITY;
  const belowMin = rule.exclusiveMin ? value <= rule.min : value < rule.min;
  const aboveMax = rule.exclusiveMax ? value >= max : value > max;
  const notInteger = rule.integer === true && !Number.isInteger(value);
  if (Number.isFinite(value) && !belowMin && !aboveMax && !notInteger) return;

  let expected = `${rule.integer ? 'an integer ' : ''}${rule.exclusiveMin ? 'greater than' : 'at least'} ${rule.min}`;
  if (Number.isFinite(max)) {
    expected += ` and ${rule.exclusiveMax ? 'less than' : 'at most'} ${max}`;
  }
  throw new InvalidInputError(`${field} must be ${expected}`, { field, value });
}
