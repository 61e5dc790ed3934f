/**
 * Core data types for the Potato Chamber Twin
 * These interfaces define the fundamental data structures used throughout the system
 */

// Crop development stages, driven by accumulated thermal time
export enum PhenologyStage {
  PRE_EMERGENCE = 'pre_emergence',
  VEGETATIVE = 'vegetative',
  TUBER_BULKING = 'tuber_bulking',
  MATURE = 'mature'
}

// Inclusive numeric bounds
export interface NumericRange {
  min: number;
  max: number;
}

// Validation result type
export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}
