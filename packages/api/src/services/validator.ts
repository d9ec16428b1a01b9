import {
  collapseWhitespace,
  sha256,
  type DialogueTurn,
  type Provenance,
  type TrainingRecord,
} from '@groundwork/shared';
import { ValidationError } from '../utils/errors';

/**
 * Record Validator
 *
 * Total: every parsed turn sequence becomes either a frozen
 * TrainingRecord or a ValidationError value. Nothing is thrown.
 */

export interface ValidationPolicy {
  minTotalLength: number;
}

export type ValidationOutcome =
  | { ok: true; record: TrainingRecord }
  | { ok: false; error: ValidationError };

export function validateTurns(
  turns: readonly DialogueTurn[],
  provenance: Provenance,
  policy: ValidationPolicy
): ValidationOutcome {
  if (turns.length === 0 || turns.every((turn) => turn.content.trim() === '')) {
    return { ok: false, error: new ValidationError('EmptyContent', 'Record has no content') };
  }

  const blank = turns.findIndex((turn) => turn.content.trim() === '');
  if (blank !== -1) {
    return { ok: false, error: new ValidationError('BlankTurn', `Turn ${blank} is blank`) };
  }

  const totalLength = turns.reduce((sum, turn) => sum + turn.content.length, 0);
  if (totalLength < policy.minTotalLength) {
    return {
      ok: false,
      error: new ValidationError(
        'TooShort',
        `Record has ${totalLength} characters, minimum is ${policy.minTotalLength}`
      ),
    };
  }

  const record: TrainingRecord = Object.freeze({
    turns: Object.freeze(turns.map((turn) => Object.freeze({ role: turn.role, content: turn.content }))),
    provenance: Object.freeze({ ...provenance }),
  });
  return { ok: true, record };
}

/**
 * Dedup key: SHA-256 over the whitespace-collapsed turn contents.
 * Roles and provenance do not take part, so the same dialogue from two
 * lenses or two chunks collides.
 */
export function dedupKey(turns: readonly DialogueTurn[]): string {
  return sha256(turns.map((turn) => collapseWhitespace(turn.content)).join('\n'));
}
