import { AppendStatusRequest } from './types.js';
import { InvalidStatusEntryError } from './errors.js';

/**
 * Reject entries that would be unusable in reports
 *
 * @throws {InvalidStatusEntryError} If a required field is blank or the status code is not an integer
 */
export function assertValidAppendRequest(request: AppendStatusRequest): void {
  if (!request.provider.trim()) {
    throw new InvalidStatusEntryError('provider is required');
  }
  if (!request.orderId.trim()) {
    throw new InvalidStatusEntryError('orderId is required');
  }
  if (!request.status.trim()) {
    throw new InvalidStatusEntryError('status is required');
  }
  if (!Number.isInteger(request.statusCode)) {
    throw new InvalidStatusEntryError(`statusCode must be an integer, got ${request.statusCode}`);
  }
}

let entrySequence = 0;

/**
 * Generate an entry ID that sorts by time of logging
 *
 * IDs created by one process in the same millisecond sort in creation order.
 */
export function generateEntryId(loggedAt: string): string {
  entrySequence++;
  const sequence = entrySequence.toString().padStart(10, '0');
  return `${loggedAt}#${sequence}#${Math.random().toString(36).substring(2, 11)}`;
}
