/**
 * Test Setup
 * Runs before each test file, ahead of any module that reads config
 */

process.env.LOG_LEVEL = 'silent';
