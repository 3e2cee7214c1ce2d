import type { TaskRecord, TaskStatus, TerminalTask } from './types.js';

export function isTerminalStatus(status: TaskStatus): boolean {
  return status === 'completed' || status === 'failed';
}

export function isTerminal(record: TaskRecord): record is TerminalTask {
  return isTerminalStatus(record.status);
}

// pending -> failed only covers cancelling a task before any worker owns it.
export function isTransitionAllowed(from: TaskStatus, to: TaskStatus): boolean {
  if (from === 'pending') return to === 'processing' || to === 'failed';
  if (from === 'processing') return to === 'processing' || to === 'completed' || to === 'failed';
  return false;
}
