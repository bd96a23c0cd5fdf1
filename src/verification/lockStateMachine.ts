// src/verification/lockStateMachine.ts
// Two states per document: locked (sensitive input blocked) and unlocked.
//
//   locked   --verify_success-->  unlocked   (fires "unlocked")
//   unlocked --verify_success-->  unlocked   (no transition)
//   unlocked --relock-->          locked     (fires "relocked", new round)
//   locked   --relock-->          locked     (no transition)

import type { DbAdapter } from "../db/types.js";
import { createLockStateStore } from "../store/lockStates.js";
import { DocumentNotFoundError } from "./errors.js";
import type { LockState, LockTransitionKind, VerificationMethod } from "./types.js";

export type LockEvent =
  | { type: "verify_success"; method: VerificationMethod; actor: string; at: number }
  | { type: "relock"; actor: string; at: number };

export interface LockTransitionResult {
  state: LockState;
  fired: LockTransitionKind | null;
}

/** Pure transition function. Returns the input state unchanged when nothing fires. */
export function applyLockEvent(state: LockState, event: LockEvent): LockTransitionResult {
  switch (event.type) {
    case "verify_success":
      if (!state.sensitiveInputLocked) {
        return { state, fired: null };
      }
      return {
        state: {
          ...state,
          sensitiveInputLocked: false,
          unlockedAt: event.at,
          unlockedMethod: event.method,
          unlockedBy: event.actor,
        },
        fired: "unlocked",
      };

    case "relock":
      if (state.sensitiveInputLocked) {
        return { state, fired: null };
      }
      return {
        state: {
          ...state,
          sensitiveInputLocked: true,
          unlockedAt: null,
          unlockedMethod: null,
          unlockedBy: null,
          lockRound: state.lockRound + 1,
        },
        fired: "relocked",
      };
  }
}

export class ConcurrentLockUpdateError extends Error {
  constructor(readonly docId: string) {
    super(`Lock state for ${docId} changed during update`);
    this.name = "ConcurrentLockUpdateError";
  }
}

/**
 * Apply an event to the stored lock state inside the caller's transaction.
 * The write is conditional on the row still holding the state that was read.
 */
export async function fireLockEvent(
  tx: DbAdapter,
  docId: string,
  event: LockEvent
): Promise<LockTransitionResult> {
  const store = createLockStateStore(tx);
  const current = await store.get(docId);
  if (!current) {
    throw new DocumentNotFoundError(docId);
  }

  const result = applyLockEvent(current, event);
  if (result.fired) {
    const applied = await store.compareAndSet(current, result.state, event.at);
    if (!applied) {
      throw new ConcurrentLockUpdateError(docId);
    }
  }
  return result;
}
