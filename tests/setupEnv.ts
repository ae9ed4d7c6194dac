// Keep test output quiet and off the filesystem
process.env.LOG_TO_FILE = 'false';
process.env.LOG_LEVEL = 'critical';
