// utils/index.ts
// ==========================
// 📦 Utility Exports
// ==========================

export {
  formatError,
  formatErrorWithColors,
  formatLocation,
  formatRuntimeError,
  formatCompilationError,
  toParseError,
  isValidLocation,
} from './format';
export { highlightSnippet } from './highlight';
export { createLogger, logTracer, type Logger } from './log';
export type { Location, Position } from './types';
