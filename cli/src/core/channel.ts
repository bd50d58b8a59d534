/**
 * Confirmer: asks the human what to do with a proposed action
 *
 * Decisions:
 *   approve   run the action (still subject to vetting)
 *   skip      do not run it; recorded in history, step ends done
 *   cancel    abandon the step without recording anything
 *   override  discard the proposal and regenerate from the given text
 */

import type { Action } from './types.js';

export type ConfirmDecision =
  | { kind: 'approve' }
  | { kind: 'skip' }
  | { kind: 'cancel' }
  | { kind: 'override'; instruction: string };

export interface ConfirmRequest {
  action: Action;
  explanation: string;
  /** 0 for the first proposal, n for the n-th correction. */
  attempt: number;
}

export interface Confirmer {
  confirm(request: ConfirmRequest): Promise<ConfirmDecision>;
}

/** Approves everything; used for -y and non-interactive modes. */
export class AutoApprove implements Confirmer {
  async confirm(_request: ConfirmRequest): Promise<ConfirmDecision> {
    return { kind: 'approve' };
  }
}

/**
 * Map a typed answer to a decision. Empty input approves; anything that
 * is not a known keyword is an override instruction.
 */
export function parseDecision(answer: string): ConfirmDecision {
  const choice = answer.trim();
  switch (choice.toLowerCase()) {
    case '':
    case 'y':
    case 'yes':
      return { kind: 'approve' };
    case 's':
    case 'skip':
      return { kind: 'skip' };
    case 'q':
    case 'n':
    case 'no':
    case 'cancel':
      return { kind: 'cancel' };
    default:
      return { kind: 'override', instruction: choice };
  }
}
