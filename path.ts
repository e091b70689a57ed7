import { PathError } from './errors';
import { err, ok, Result } from './result';
import { DerivationPath, DerivationStep } from './types';

export const HARDENED_OFFSET = 0x80000000;

const SEGMENT = /^(\d+)(['h])?$/;

const parseSegment = (segment: string): Result<DerivationStep, PathError> => {
  const match = SEGMENT.exec(segment);
  if (!match) {
    return err(new PathError('INVALID_SEGMENT', segment, `Invalid path segment "${segment}": expected a decimal index optionally followed by h or '.`));
  }
  const raw = Number(match[1]);
  if (raw >= HARDENED_OFFSET) {
    return err(new PathError('INDEX_OUT_OF_RANGE', segment, `Path index ${match[1]} is out of range (must be below ${HARDENED_OFFSET}).`));
  }
  const hardened = match[2] !== undefined;
  return ok({ index: hardened ? raw + HARDENED_OFFSET : raw, hardened });
};

/**
 * Parse a path such as `m/84h/1h/0h/0/0` into derivation steps, in the
 * order they are applied. The `m/` prefix is optional and empty segments
 * are skipped.
 */
export const parsePath = (text: string): Result<DerivationPath, PathError> => {
  const body = text.startsWith('m/') ? text.slice(2) : text;
  const steps: DerivationStep[] = [];
  for (const segment of body.split('/')) {
    if (!segment) continue;
    const step = parseSegment(segment);
    if (!step.ok) return step;
    steps.push(step.value);
  }
  return ok(steps);
};

export const formatPath = (path: DerivationPath): string =>
  ['m', ...path.map(step => (step.hardened ? `${step.index - HARDENED_OFFSET}h` : `${step.index}`))].join('/');
