export * from './analytics.js';
export * from './browser.js';
export * from './catalog.js';
export * from './config.js';
export * from './constraints.js';
export * from './engine.js';
export * from './errors.js';
export * from './formats.js';
export * from './interaction.js';
export * from './logger.js';
export * from './pattern-sampler.js';
export * from './playwright-session.js';
export * from './random.js';
export * from './report.js';
export * from './run-machine.js';
export * from './run-record.js';
export * from './scheduler.js';
export * from './schema.js';
export * from './sink.js';
export * from './synthesizer.js';
export * from './types.js';
