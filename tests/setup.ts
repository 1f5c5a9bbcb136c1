// Set test environment BEFORE any imports
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'OFF';
process.env.LOG_TO_FILE = 'false';
delete process.env.SENTRY_DSN;
