import crypto from 'crypto';
import { RunEvent, RunEventType } from '../core/types';
import { appendRunEvent, readRunEvents } from './storage';

export const makeEvent = (runId: string, type: RunEventType, details?: Record<string, unknown>): RunEvent => ({
  id: crypto.randomUUID(),
  runId,
  timestamp: new Date().toISOString(),
  type,
  details
});

export const appendEvent = (outDir: string, event: RunEvent) => {
  appendRunEvent(outDir, event);
};

export type RunStatus = 'IN_PROGRESS' | 'COMPLETED' | 'FAILED' | 'UNKNOWN';

export const getRunStatus = (outDir: string, runId: string): RunStatus => {
  const last = readRunEvents(outDir, runId).at(-1);
  if (!last) return 'UNKNOWN';
  switch (last.type) {
    case 'RUN_COMPLETED':
      return 'COMPLETED';
    case 'RUN_FAILED':
      return 'FAILED';
    default:
      return 'IN_PROGRESS';
  }
};
