import { configureLogger, MemorySink } from '../src/observability/logger.js';

// Keep test output clean; tests that inspect logs install their own sink.
configureLogger({ level: 'silent', sinks: [new MemorySink()] });
