// src/testing/setup.ts
// Structured logs are noise under test.
process.env.LOG_LEVEL = "SILENT";
