// src/tests/setup.ts

// Keep test output clean: no console or file logging
process.env.LOGGING_CONFIG = JSON.stringify({ profile: 'Silent' });

// Storage tests point at temporary databases
delete process.env.TIMESHEET_DB;
