import dotenv from 'dotenv';

// Where files live must not drift between restarts: a process manager can keep stale
// variables around, so these keys always come from .env when it sets them.
const PINNED_KEYS = ['IMAGE_STORAGE', 'PUBLIC_DIR', 'SECURE_STORAGE_DIR', 'APP_URL'] as const;

const { parsed } = dotenv.config();

for (const key of PINNED_KEYS) {
  const fromFile = parsed?.[key]?.trim();
  if (!fromFile || process.env[key] === fromFile) continue;
  if (process.env[key] !== undefined) {
    // Runs before the logger is configured.
    process.stderr.write(`[env] ${key} taken from .env\n`);
  }
  process.env[key] = fromFile;
}
