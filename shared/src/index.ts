// Core types and enums for the fixture record/replay harness
export * from './enums.js';
export * from './fixtures.js';
export * from './api.js';
