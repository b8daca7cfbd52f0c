import { AuditEntry, Cell } from '../../types/cell.types';

export function assertNextSequence(log: readonly AuditEntry[], entry: AuditEntry): void {
  const expected = log.length > 0 ? log[log.length - 1].sequence + 1 : 1;
  if (entry.sequence !== expected) {
    throw new Error(`Audit entry for ${entry.cellId} has sequence ${entry.sequence}, expected ${expected}`);
  }
}

/** A committed review keeps the cell's identity and moves its version forward by one */
export function assertCommit(cellId: string, stored: Cell, next: Cell): void {
  if (next.cellId !== cellId || next.jobId !== stored.jobId) {
    throw new Error(`Review of ${cellId} tried to store a different cell`);
  }
  if (next.version !== stored.version + 1) {
    throw new Error(`Review of ${cellId} stored version ${next.version}, expected ${stored.version + 1}`);
  }
}
