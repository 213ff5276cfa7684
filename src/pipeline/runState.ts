import { IllegalTransitionError } from '../agents/errors';
import type { RunState } from './types';

const ORDER: readonly RunState[] = [
  'Init',
  'KeywordsReady',
  'SynonymsReady',
  'CandidatesScored',
  'CandidatesSelected',
  'RubricScored',
  'Ranked',
  'Done',
];

/** Forward-only run state. `Failed` is reachable only before selection. */
export class RunStateMachine {
  private current: RunState = 'Init';
  private readonly transitions: RunState[] = ['Init'];

  get state(): RunState {
    return this.current;
  }

  get history(): RunState[] {
    return [...this.transitions];
  }

  get terminal(): boolean {
    return this.current === 'Done' || this.current === 'Failed';
  }

  advance(next: RunState): void {
    if (next === 'Failed') {
      this.fail();
      return;
    }
    const from = ORDER.indexOf(this.current);
    const to = ORDER.indexOf(next);
    if (this.current === 'Failed' || to !== from + 1) {
      throw new IllegalTransitionError(this.current, next);
    }
    this.current = next;
    this.transitions.push(next);
  }

  fail(): void {
    if (this.terminal || ORDER.indexOf(this.current) >= ORDER.indexOf('CandidatesSelected')) {
      throw new IllegalTransitionError(this.current, 'Failed');
    }
    this.current = 'Failed';
    this.transitions.push('Failed');
  }
}
