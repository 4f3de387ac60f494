import path from 'path';
import dotenv from 'dotenv';

import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Load the project-root .env. A missing file is fine: the environment may
 * already carry every setting.
 */
export function loadEnv(envPath = path.resolve(__dirname, '..', '.env')): void {
  const result = dotenv.config({ path: envPath, override: true });
  if (result.error) {
    console.warn(`.env not loaded from ${envPath}:`, result.error.message);
  }
}
