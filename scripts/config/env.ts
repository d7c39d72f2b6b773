import 'dotenv/config';
import { fileURLToPath } from 'node:url';

const dataFile = (name: string) => fileURLToPath(new URL(`../data/${name}`, import.meta.url));

export const Env = {
  rulesPath: process.env.RULES_PATH || dataFile('rules.json'),
  catalogPath: process.env.CATALOG_PATH || dataFile('catalog.json'),
  activityCsvPath: process.env.ACTIVITY_CSV_PATH || dataFile('activity_daily.csv'),
  moduleCode: process.env.MODULE_CODE || 'M1',
  focusCode: process.env.FOCUS_CODE || 'M1O2',
  strict: ['1', 'true', 'yes'].includes((process.env.RULES_STRICT || '').toLowerCase()),
};
