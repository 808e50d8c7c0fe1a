import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import { readSettings } from './settings.js';

const cwdEnvPath = path.resolve(process.cwd(), '.env');
const repoEnvPath = path.resolve(process.cwd(), '..', '.env');

dotenv.config({ path: cwdEnvPath });
if (repoEnvPath !== cwdEnvPath && fs.existsSync(repoEnvPath)) {
  dotenv.config({ path: repoEnvPath, override: false });
}

export const env = readSettings(process.env);
