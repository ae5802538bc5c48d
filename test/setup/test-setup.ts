/**
 * Test Setup
 * Runs before each test file
 */

// Keep pino quiet unless a run asks for logs explicitly
process.env.LOG_LEVEL ??= 'silent';
