export * from './collaborators.js';
export * from './status.js';
