/** Commander argument parsers that narrow raw strings to the engine's types. */

import { InvalidArgumentError } from 'commander';
import {
  SPEC_STATUSES,
  SPEC_WEIGHTS,
  type ChangeType,
  type SpecStatus,
  type SpecWeight,
  type SyncDirection,
} from 'specloom-core';

const DIRECTIONS: readonly SyncDirection[] = ['file-to-store', 'store-to-file', 'bidirectional'];
const CHANGE_TYPES: readonly ChangeType[] = ['added', 'modified', 'deleted', 'renamed'];

function oneOf<T extends string>(allowed: readonly T[], value: string): T {
  const match = allowed.find((a) => a === value);
  if (!match) throw new InvalidArgumentError(`Expected one of: ${allowed.join(', ')}`);
  return match;
}

export function parseWeight(value: string): SpecWeight {
  return oneOf(SPEC_WEIGHTS, value.toUpperCase());
}

export function parseStatus(value: string): SpecStatus {
  return oneOf(SPEC_STATUSES, value);
}

export function parseDirection(value: string): SyncDirection {
  return oneOf(DIRECTIONS, value);
}

export function parseChangeType(value: string): ChangeType {
  return oneOf(CHANGE_TYPES, value);
}

export function parseCount(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError('Expected a non-negative integer');
  return n;
}
