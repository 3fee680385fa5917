/**
 * Core types for the Diabetes Progression Predictor
 * Focus: the feature vector sent to the model and the JSON envelopes returned to clients
 */

// ============================================
// Features
// ============================================

/** Canonical order: the remote model reads features by position, not by name */
export const FEATURE_NAMES = ['age', 'sex', 'bmi', 'bp', 's1', 's2', 's3', 's4', 's5', 's6'] as const;

export type FeatureName = (typeof FEATURE_NAMES)[number];

/** All values are normalized upstream (mean-centered, scaled) */
export const FEATURE_DESCRIPTIONS: Readonly<Record<FeatureName, string>> = {
  age: 'Patient age',
  sex: 'Patient sex',
  bmi: 'Body mass index',
  bp: 'Average blood pressure',
  s1: 'Total serum cholesterol',
  s2: 'Low-density lipoproteins',
  s3: 'High-density lipoproteins',
  s4: 'Total cholesterol / HDL ratio',
  s5: 'Log of serum triglycerides',
  s6: 'Blood sugar level',
};

export interface FeatureVector {
  /** Ten finite values in FEATURE_NAMES order */
  readonly values: readonly number[];
  readonly byName: Readonly<Record<FeatureName, number>>;
}

// ============================================
// API Envelopes
// ============================================

export interface PredictSuccess {
  success: true;
  prediction: number;
}

export interface PredictFailure {
  success: false;
  error: string;
}

export type PredictResponse = PredictSuccess | PredictFailure;

export type HealthReport =
  | { status: 'healthy'; app: string; version: string; warnings: string[] }
  | { status: 'unhealthy'; errors: string[]; warnings: string[] };
