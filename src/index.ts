/**
 * @fileoverview labelbook - data annotation bookkeeping
 *
 * Records category labels, scores data entries against quality criteria, logs
 * pairwise decisions, finds conflicting labels and exports everything to JSON
 * and CSV. All state lives in a RecordStore the caller owns.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { RecordStore, annotateImage, qualityCheck, saveReport } from 'labelbook';
 *
 * const store = new RecordStore();
 * const entry = annotateImage(store, { id: 'IMG_001', category: 'vehicle', confidence: 5 });
 * qualityCheck(store, entry, ['completeness', 'format']);
 * saveReport(store, 'out/annotation_report.json');
 * ```
 *
 * @packageDocumentation
 */

export * from './types.js';
export { LABELBOOK_VERSION } from './version.js';

// Core
export {
  ConfigurationError,
  IOError,
  LabelbookError,
  ValidationError,
  getErrorMessage,
  isLabelbookError,
  type ErrorJSON,
  type IOOperation,
} from './core/errors.js';
export { createMonotonicClock, createSteppingClock, type Clock, type TimeSource } from './core/clock.js';
export { Err, Ok, type Result } from './core/result.js';

// Store and operations
export { RecordStore, type RecordStoreOptions, type RecordStoreSize } from './store/record_store.js';
export { AnnotationInputSchema, annotateImage } from './annotation/annotate.js';
export * from './quality/index.js';
export { pairwiseComparison } from './comparison/comparator.js';
export { analyzeDistribution, consistencyCheck } from './consistency/checker.js';
export * from './report/index.js';
export { AnnotationWorkbench, type WorkbenchOptions } from './workbench.js';

// Config and logging
export * from './config/index.js';
export { setLogLevel, getLogLevel, type LogLevel } from './telemetry/logger.js';
