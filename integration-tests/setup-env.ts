// Keep test output readable; override with LOG_LEVEL=debug when needed
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';
