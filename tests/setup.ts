/**
 * Test environment setup
 * Runs before each test file is loaded, so the logger picks these up
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
