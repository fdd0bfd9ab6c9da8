import fs from 'fs';
import path from 'path';
import { SimulationConfig } from './types';
import { validateSimulationConfig } from './schema';

export const ensureDir = (dir: string) => {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
};

export const readJSONFile = (filePath: string): unknown => {
  const raw = fs.readFileSync(filePath, 'utf-8');
  return JSON.parse(raw);
};

export const writeJSONFile = (filePath: string, data: unknown) => {
  ensureDir(path.dirname(filePath));
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2));
};

const ENV_OVERRIDES: Record<string, keyof SimulationConfig> = {
  BACKTEST_INITIAL_CAPITAL: 'initialCapital',
  BACKTEST_TRANSACTION_COST_PCT: 'transactionCostPct',
  BACKTEST_SLIPPAGE_PCT: 'slippagePct',
  BACKTEST_MIN_TRADE_SIZE: 'minTradeSize',
  BACKTEST_REBALANCE_DAYS: 'rebalanceFrequencyDays'
};

export const applyEnvOverrides = (raw: unknown, env: NodeJS.ProcessEnv): unknown => {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return raw;
  const merged: Record<string, unknown> = { ...raw };
  for (const [envKey, field] of Object.entries(ENV_OVERRIDES)) {
    const value = env[envKey];
    if (value === undefined || value.trim() === '') continue;
    const parsed = Number(value);
    if (Number.isNaN(parsed)) {
      throw new Error(`${envKey} must be numeric, got "${value}"`);
    }
    merged[field] = parsed;
  }
  return merged;
};

export const loadSimulationConfig = (configPath: string, env: NodeJS.ProcessEnv = process.env): SimulationConfig => {
  const raw = applyEnvOverrides(readJSONFile(configPath), env);
  const result = validateSimulationConfig(raw);
  if (!result.success) {
    throw new Error(`Invalid config ${configPath}: ${result.errors.join('; ')}`);
  }
  return result.value;
};

export const mulberry32 = (seed: number) => {
  let t = seed + 0x6d2b79f5;
  return () => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
};

// FNV-1a
export const hashString = (input: string): number => {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
};

export const sum = (arr: number[]): number => arr.reduce((a, b) => a + b, 0);

export const average = (arr: number[]): number => (arr.length ? sum(arr) / arr.length : 0);

// Sample (n - 1) standard deviation; 0 for fewer than two values.
export const sampleStdev = (arr: number[]): number => {
  if (arr.length < 2) return 0;
  const mean = average(arr);
  return Math.sqrt(sum(arr.map((v) => (v - mean) ** 2)) / (arr.length - 1));
};
