/**
 * Trained model storage and the baseline models the pipeline trains.
 */

export {
  ModelRegistry,
  type ModelState,
  type ModelMetadata,
  type ModelMetrics,
  type ConfusionMatrix,
  type TrainedModelInput,
  type TrainedModelRecord,
  type SerializedModel,
} from "./registry.js";

export {
  fitEncoders,
  encodeFeatures,
  trainNearestCentroid,
  trainLeastSquares,
  predict,
  featureImportance,
  localContributions,
  seededShuffle,
  type BaselineModel,
  type Encoders,
  type FeatureScaling,
} from "./baseline.js";
