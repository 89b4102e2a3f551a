import { z } from 'zod';
import type { AwaitingPhase } from '../types.js';
import { TransactionError } from '../types.js';
import type { SnapshotState, TransactionSnapshot } from './snapshot.js';

/** Schemas for the caller-owned parts of a snapshot. */
export interface SnapshotSchemas<P, I, C> {
  participant: z.ZodType<P, z.ZodTypeDef, unknown>;
  id: z.ZodType<I, z.ZodTypeDef, unknown>;
  client: z.ZodType<C, z.ZodTypeDef, unknown>;
}

export type SnapshotParseResult<P, I, C> =
  | { ok: true; snapshot: TransactionSnapshot<P, I, C> }
  | { ok: false; error: TransactionError; detail: string };

const awaitingState = <T extends AwaitingPhase>(phase: T) =>
  z.object({ phase: z.literal(phase), awaiting: z.array(z.unknown()) });

/** Structure only; participants, id and client are checked by the caller's schemas. */
export const snapshotShape = z.object({
  id: z.unknown(),
  client: z.unknown(),
  participants: z.array(z.unknown()),
  state: z.discriminatedUnion('phase', [
    z.object({ phase: z.literal('INTERACTIVE') }),
    z.object({ phase: z.literal('ABORTED') }),
    z.object({ phase: z.literal('COMMITTED') }),
    awaitingState('VOTING'),
    awaitingState('COMMITTING'),
    awaitingState('ROLLING_BACK'),
  ]),
});

function formatIssues(error: z.ZodError, prefix: string): string {
  return error.issues
    .map((issue) => {
      const path = [prefix, ...issue.path.map(String)].filter((part) => part !== '').join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

function invalid<P, I, C>(detail: string): SnapshotParseResult<P, I, C> {
  return { ok: false, error: TransactionError.INVALID_SNAPSHOT, detail };
}

/**
 * Validate untrusted input (a stored row, a message) as a snapshot.
 * Invariants between the parts are checked later by `restore`.
 */
export function parseSnapshot<P, I, C>(
  input: unknown,
  schemas: SnapshotSchemas<P, I, C>,
): SnapshotParseResult<P, I, C> {
  const shape = snapshotShape.safeParse(input);
  if (!shape.success) {
    return invalid(formatIssues(shape.error, ''));
  }
  const raw = shape.data;

  const id = schemas.id.nullable().safeParse(raw.id ?? null);
  if (!id.success) {
    return invalid(formatIssues(id.error, 'id'));
  }
  const client = schemas.client.nullable().safeParse(raw.client ?? null);
  if (!client.success) {
    return invalid(formatIssues(client.error, 'client'));
  }

  const participants = z.array(schemas.participant).safeParse(raw.participants);
  if (!participants.success) {
    return invalid(formatIssues(participants.error, 'participants'));
  }

  let state: SnapshotState<P>;
  const rawState = raw.state;
  switch (rawState.phase) {
    case 'INTERACTIVE':
    case 'ABORTED':
    case 'COMMITTED':
      state = { phase: rawState.phase };
      break;
    case 'VOTING':
    case 'COMMITTING':
    case 'ROLLING_BACK': {
      const awaiting = z.array(schemas.participant).safeParse(rawState.awaiting);
      if (!awaiting.success) {
        return invalid(formatIssues(awaiting.error, 'state.awaiting'));
      }
      state = { phase: rawState.phase, awaiting: awaiting.data };
      break;
    }
  }

  return {
    ok: true,
    snapshot: { id: id.data, client: client.data, participants: participants.data, state },
  };
}
