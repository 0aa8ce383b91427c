/**
 * @file src/shared/paths.ts
 * @description Helper for resolving the directories used by the kitchenconv CLI.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

const ROOT = path.join(os.homedir(), '.kitchenconv');

const ensureDir = (target: string): void => {
  fs.mkdirSync(target, { recursive: true });
};

export const paths = {
  ROOT,
  CONFIG: path.join(ROOT, 'config.json'),
  ensureDir,
};
