import "reflect-metadata";

process.env.NODE_ENV = "test";
process.env.ARBITER_USER = "arbiter";
process.env.ARBITER_PASS = "test-secret";
process.env.ARBITER_NAME = "Test Arbiter";
process.env.DEFAULT_CURRENCY = "IDR";
process.env.SESSION_SWEEP_INTERVAL_MS = "3600000";
