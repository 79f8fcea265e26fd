/**
 * Blunder Classifier Module
 */

export { BlunderDetector } from './BlunderDetector.js';
export type { BlunderOptions, BlunderDetectorDeps } from './BlunderDetector.js';
export { BLUNDER_THRESHOLDS, getBlunderSeverity } from './BlunderThresholds.js';
