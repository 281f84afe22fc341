export { ContextEngine, createContextEngine, type EngineConfig } from './context-engine.js';
