import { InvalidArgumentError } from 'commander';

/**
 * Commander argument parser for non-negative integer options
 */
export function parseInteger(value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parseInt(trimmed, 10);
}
