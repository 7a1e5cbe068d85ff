import { InvalidInputError } from '../errors.js';
import { MAX_LIST_LIMIT } from './userRepository.js';

/**
 * Validate a page size and clamp it to MAX_LIST_LIMIT.
 */
export function normalizeLimit(limit: number): number {
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new InvalidInputError('limit must be a positive integer');
  }
  return Math.min(limit, MAX_LIST_LIMIT);
}
