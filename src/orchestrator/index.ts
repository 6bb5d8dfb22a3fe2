export * from './classifier.js';
export * from './event-stream.js';
export * from './observation.js';
export * from './turn.js';
