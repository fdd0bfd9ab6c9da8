import fs from 'fs';
import { Dialect, StrategyProgram } from '../core/types';
import { normalizeDialectDocument } from './dialect';
import { readProgramText } from './lispReader';
import { parseProgram } from './parser';

const looksLikeDialectDocument = (doc: unknown): boolean =>
  typeof doc === 'object' && doc !== null && !Array.isArray(doc) && 'incantation' in doc;

// Without an explicit dialect, objects carrying an `incantation` use the alternate format.
export const parseStrategyText = (text: string, dialect?: Dialect): StrategyProgram => {
  const doc = readProgramText(text);
  const resolved = dialect ?? (looksLikeDialectDocument(doc) ? 'quantmage' : 'composer');
  return resolved === 'quantmage' ? normalizeDialectDocument(doc) : parseProgram(doc);
};

export const loadStrategyFile = (filePath: string, dialect?: Dialect): StrategyProgram => {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Strategy file not found: ${filePath}`);
  }
  return parseStrategyText(fs.readFileSync(filePath, 'utf-8'), dialect);
};
