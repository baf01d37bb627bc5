// Keep test output to failures only
process.env.LOG_LEVEL = 'error';
