// Loaded by vitest before every test file (see vitest.config.ts).
// The logger reads these at import time, so they must be set first.
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL ??= 'error';
