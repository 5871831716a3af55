/**
 * Load env from .env and .env.local in the working directory, when they exist.
 * .env.local wins over .env and over process.env; .env only fills in what is unset.
 * Import this first in scripts that read ETHQ_* or provider settings (before lib/config).
 */

import { config } from 'dotenv';
import { existsSync } from 'fs';
import { resolve } from 'path';

const envFiles: Array<{ name: string; override: boolean }> = [
  { name: '.env.local', override: true },
  { name: '.env', override: false },
];

for (const { name, override } of envFiles) {
  const path = resolve(process.cwd(), name);
  if (existsSync(path)) {
    config({ path, override });
  }
}
