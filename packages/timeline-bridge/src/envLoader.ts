import dotenv from 'dotenv';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const moduleDir = path.dirname(fileURLToPath(import.meta.url));

// קובץ .env בשורש הפרויקט
export const rootEnvPath = path.resolve(moduleDir, '../../../.env');

// קובץ .env מקומי של החבילה (packages/timeline-bridge/.env)
export const localEnvPath = path.resolve(moduleDir, '../.env');

const loadEnvFile = (filePath: string, override: boolean = false) => {
  if (!fs.existsSync(filePath)) {
    return;
  }
  const result = dotenv.config({ path: filePath, override });
  if (result.error) {
    console.warn(`[EnvLoader] Error loading .env file from ${filePath}:`, result.error.message);
  }
};

/**
 * @hebrew טוען את קובץ ה-.env של השורש ואחריו את הקובץ המקומי.
 * ערכים מהקובץ המקומי דורסים ערכים זהים מהשורש.
 */
export function loadEnvFiles(): void {
  loadEnvFile(rootEnvPath);
  loadEnvFile(localEnvPath, true);
}

loadEnvFiles();
