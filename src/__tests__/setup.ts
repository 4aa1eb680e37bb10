// Keep test output readable; suites that assert on log lines re-enable the logger
process.env.LOGGING_ENABLED = 'false';
