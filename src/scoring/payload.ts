/**
 * Request bodies for the MLflow serving endpoint.
 * Both layouts describe one row keyed by the feature names.
 */

import { FEATURE_NAMES, type FeatureName, type FeatureVector } from '../types/index.js';
import type { PayloadFormat } from '../config/config.js';

export interface SplitPayload {
  dataframe_split: {
    columns: FeatureName[];
    index: number[];
    data: number[][];
  };
}

export interface RecordsPayload {
  dataframe_records: Array<Record<FeatureName, number>>;
}

export type ScoringPayload = SplitPayload | RecordsPayload;

export function buildScoringPayload(vector: FeatureVector, format: PayloadFormat): ScoringPayload {
  if (format === 'records') {
    return { dataframe_records: [{ ...vector.byName }] };
  }

  return {
    dataframe_split: {
      columns: [...FEATURE_NAMES],
      index: [0],
      data: [[...vector.values]],
    },
  };
}
