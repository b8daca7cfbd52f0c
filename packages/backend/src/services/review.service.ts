import { z } from 'zod';
import { ReviewState } from '../config/constants';
import { AuditAction, AuditEntry, Cell, ReviewAction } from '../types/cell.types';
import { ReviewRepository } from './repository/review.repository';
import { snapshotOf } from './cell.service';
import { ConcurrencyError, NotFoundError, ValidationError } from '../utils/errors';
import { nowIso } from '../utils/text.utils';

const REVIEWABLE_STATES = [ReviewState.CONFIRMED, ReviewState.REJECTED] as const;

/**
 * Targets reachable from each state. EXTRACTED and MISSING_DATA are only ever
 * assigned when a cell is created.
 */
export const REVIEW_TRANSITIONS: Record<ReviewState, readonly ReviewState[]> = {
  [ReviewState.EXTRACTED]: [ReviewState.CONFIRMED, ReviewState.REJECTED, ReviewState.MANUAL_UPDATED],
  [ReviewState.CONFIRMED]: [ReviewState.CONFIRMED, ReviewState.REJECTED, ReviewState.MANUAL_UPDATED],
  [ReviewState.REJECTED]: [ReviewState.CONFIRMED, ReviewState.REJECTED, ReviewState.MANUAL_UPDATED],
  [ReviewState.MANUAL_UPDATED]: [ReviewState.CONFIRMED, ReviewState.REJECTED, ReviewState.MANUAL_UPDATED],
  [ReviewState.MISSING_DATA]: [ReviewState.CONFIRMED, ReviewState.REJECTED, ReviewState.MANUAL_UPDATED],
};

const reviewActionSchema = z
  .object({
    actor: z.string().trim().min(1, 'actor is required'),
    review_state: z.string().optional(),
    manual_value: z
      .string()
      .refine((value) => value.trim().length > 0, 'manual_value must not be empty')
      .optional(),
    reason: z.string().optional(),
    expected_version: z.number().int().min(1).optional(),
  })
  .refine((body) => (body.review_state === undefined) !== (body.manual_value === undefined), {
    message: 'exactly one of review_state or manual_value must be provided',
  });

function isReviewableState(value: string): value is (typeof REVIEWABLE_STATES)[number] {
  return REVIEWABLE_STATES.some((state) => state === value);
}

/** Parses a review action as it arrives from the API layer */
export function parseReviewAction(body: unknown): ReviewAction {
  const parsed = reviewActionSchema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues.map((issue) => issue.message).join('; '));
  }

  const { actor, review_state, manual_value, reason, expected_version } = parsed.data;
  if (review_state !== undefined && !isReviewableState(review_state)) {
    throw new ValidationError(
      `review_state must be one of ${REVIEWABLE_STATES.join(', ')}; use manual_value for manual edits`
    );
  }

  return {
    actor,
    ...(review_state !== undefined && { reviewState: review_state }),
    ...(manual_value !== undefined && { manualValue: manual_value }),
    ...(reason !== undefined && { reason }),
    ...(expected_version !== undefined && { expectedVersion: expected_version }),
  };
}

function targetState(action: ReviewAction): { state: ReviewState; auditAction: AuditAction } {
  if (action.manualValue !== undefined) {
    if (action.reviewState !== undefined) {
      throw new ValidationError('exactly one of review_state or manual_value must be provided');
    }
    return { state: ReviewState.MANUAL_UPDATED, auditAction: 'MANUAL_EDIT' };
  }

  switch (action.reviewState) {
    case ReviewState.CONFIRMED:
      return { state: ReviewState.CONFIRMED, auditAction: 'CONFIRM' };
    case ReviewState.REJECTED:
      return { state: ReviewState.REJECTED, auditAction: 'REJECT' };
    case undefined:
      throw new ValidationError('exactly one of review_state or manual_value must be provided');
    default:
      throw new ValidationError(`${action.reviewState} cannot be set by a review action`);
  }
}

/**
 * Computes the cell after `action`. Manual edits replace `value` only;
 * `valueRaw`, `valueNormalized` and the citation keep the original extraction.
 */
export function applyTransition(cell: Cell, action: ReviewAction, timestamp: string): { cell: Cell; auditAction: AuditAction } {
  const { state, auditAction } = targetState(action);

  if (!REVIEW_TRANSITIONS[cell.reviewState].includes(state)) {
    throw new ValidationError(`Cannot move a ${cell.reviewState} cell to ${state}`);
  }

  return {
    cell: {
      ...cell,
      value: action.manualValue !== undefined ? action.manualValue : cell.value,
      reviewState: state,
      version: cell.version + 1,
      updatedAt: timestamp,
    },
    auditAction,
  };
}

export interface ReviewOutcome {
  cell: Cell;
  audit: AuditEntry;
}

export class ReviewService {
  constructor(private readonly repository: ReviewRepository) {}

  /**
   * Applies one review action. The transition and its audit entry are committed
   * together; an action carrying a stale `expectedVersion` fails with
   * ConcurrencyError and changes nothing.
   */
  async applyReviewAction(cellId: string, action: ReviewAction): Promise<ReviewOutcome> {
    const timestamp = nowIso();

    const outcome = await this.repository.commitReview(cellId, (cell, history) => {
      if (action.expectedVersion !== undefined && action.expectedVersion !== cell.version) {
        throw new ConcurrencyError(cellId, action.expectedVersion, cell.version);
      }

      const { cell: next, auditAction } = applyTransition(cell, action, timestamp);
      const lastSequence = history.length > 0 ? history[history.length - 1].sequence : 0;

      return {
        cell: next,
        audit: {
          cellId,
          sequence: lastSequence + 1,
          actor: action.actor,
          timestamp,
          action: auditAction,
          reason: action.reason ?? null,
          before: snapshotOf(cell),
          after: snapshotOf(next),
        },
      };
    });

    const { cell, audit } = outcome;
    console.log(
      `[Review] ${cellId}: ${audit.before?.reviewState ?? 'none'} -> ${cell.reviewState} by ${action.actor} (v${cell.version})`
    );
    return { cell, audit };
  }

  async getAuditLog(cellId: string): Promise<AuditEntry[]> {
    const cell = await this.repository.getCell(cellId);
    if (!cell) {
      throw new NotFoundError(`Cell ${cellId} not found`);
    }
    return this.repository.listAudit(cellId);
  }
}
