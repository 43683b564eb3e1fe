export * from './trace.js';
export * from './mode.js';
export * from './budget.js';
export * from './dispatch.js';
export * from './agent.js';
export * from './routine.js';
export * from './action.js';
export * from './model.js';
export * from './config.js';
