import fs from 'fs';
import path from 'path';
import { ensureDir, writeJSONFile } from '../core/utils';
import { RunEvent, RunEventType } from '../core/types';

const RUN_EVENT_TYPES: readonly RunEventType[] = ['RUN_STARTED', 'DAY_SKIPPED', 'RUN_COMPLETED', 'RUN_FAILED'];

export const DEFAULT_OUT_DIR = 'runs';

export const resolveRunDir = (outDir: string, runId: string) => path.resolve(outDir, runId);

export const writeRunArtifact = (outDir: string, runId: string, fileName: string, data: unknown): string => {
  const filePath = path.join(resolveRunDir(outDir, runId), fileName);
  writeJSONFile(filePath, data);
  return filePath;
};

export const writeRunText = (outDir: string, runId: string, fileName: string, text: string): string => {
  const runDir = resolveRunDir(outDir, runId);
  ensureDir(runDir);
  const filePath = path.join(runDir, fileName);
  fs.writeFileSync(filePath, text);
  return filePath;
};

export const readRunArtifact = (outDir: string, runId: string, fileName: string): unknown => {
  const filePath = path.join(resolveRunDir(outDir, runId), fileName);
  if (!fs.existsSync(filePath)) return undefined;
  return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
};

const eventsFile = (outDir: string, runId: string) => path.join(resolveRunDir(outDir, runId), 'events.jsonl');

export const appendRunEvent = (outDir: string, event: RunEvent) => {
  ensureDir(resolveRunDir(outDir, event.runId));
  fs.appendFileSync(eventsFile(outDir, event.runId), `${JSON.stringify(event)}\n`);
};

const isRunEvent = (value: unknown): value is RunEvent =>
  typeof value === 'object' &&
  value !== null &&
  'id' in value &&
  'runId' in value &&
  'type' in value &&
  typeof value.id === 'string' &&
  typeof value.runId === 'string' &&
  RUN_EVENT_TYPES.some((t) => t === value.type);

export const readRunEvents = (outDir: string, runId: string): RunEvent[] => {
  const file = eventsFile(outDir, runId);
  if (!fs.existsSync(file)) return [];
  const content = fs.readFileSync(file, 'utf-8').trim();
  if (!content.length) return [];
  return content.split('\n').map((line, idx) => {
    const parsed: unknown = JSON.parse(line);
    if (!isRunEvent(parsed)) {
      throw new Error(`Malformed event on line ${idx + 1} of ${file}`);
    }
    return parsed;
  });
};
